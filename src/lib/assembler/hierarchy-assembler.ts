/**
 * Builds the whole record graph in dependency order.
 *
 * Phases run strictly in sequence, each consuming handles produced by the
 * previous one:
 *   legal-entities -> biobanks -> network -> collections -> donors -> complete
 * Records are kept in build order, parents before children; the external
 * validator processes entries positionally.
 */

import type { GeneratorConfig } from "../../types/config.js";
import type { AnyRecord, BuiltRecord } from "../../types/records.js";
import type { FactProvider } from "../random/fact-provider.js";
import { GenerationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { validateGeneratorConfig } from "../../utils/config-loader.js";
import { collectReferences, fullUrlOf } from "../identity/ids.js";
import { COLLECTION_NAMES } from "../registries/places.js";
import {
  branchRecords,
  buildBiobank,
  buildCollection,
  buildCollectionOrganization,
  buildDonorBranch,
  buildLegalEntity,
  buildNetwork,
  buildNetworkOrganization,
  drawSites,
  type Site,
} from "../builders/index.js";
import { collectionIndexFor, donorsPerCollection } from "./distribution.js";

export const ASSEMBLY_PHASES = [
  "idle",
  "legal-entities",
  "biobanks",
  "network",
  "collections",
  "donors",
  "complete",
] as const;

export type AssemblyPhase = (typeof ASSEMBLY_PHASES)[number];

export interface AssembledHierarchy {
  config: GeneratorConfig;
  seed: number;
  records: readonly AnyRecord[];
  /** Donor count per collection, by collection index */
  donorsPerCollection: readonly number[];
}

interface CollectionSlot {
  identifier: string;
  biobank: BuiltRecord<"biobank">;
}

export class HierarchyAssembler {
  private phase: AssemblyPhase = "idle";
  private readonly records: AnyRecord[] = [];
  private readonly written = new Set<string>();

  private sites: Site[] = [];
  private legalEntities: BuiltRecord<"legal-entity">[] = [];
  private biobanks: BuiltRecord<"biobank">[] = [];
  private collections: CollectionSlot[] = [];

  constructor(
    private readonly config: GeneratorConfig,
    private readonly provider: FactProvider,
  ) {
    // Fail before anything is built
    validateGeneratorConfig(config);
  }

  get currentPhase(): AssemblyPhase {
    return this.phase;
  }

  /**
   * Run every phase and return the ordered record sequence
   */
  assemble(): AssembledHierarchy {
    this.buildLegalEntities();
    this.buildBiobanks();
    this.buildNetwork();
    this.buildCollections();
    this.buildDonors();
    this.enter("complete");

    logger.debug("Hierarchy assembled", { records: this.records.length });

    return {
      config: this.config,
      seed: this.provider.seed,
      records: [...this.records],
      donorsPerCollection: donorsPerCollection(
        this.config.donors,
        this.config.collections,
      ),
    };
  }

  private enter(next: AssemblyPhase): void {
    const expected = ASSEMBLY_PHASES[ASSEMBLY_PHASES.indexOf(this.phase) + 1];
    if (next !== expected) {
      throw new GenerationError(
        `Cannot enter phase "${next}" from "${this.phase}"`,
        { from: this.phase, to: next },
      );
    }
    this.phase = next;
    logger.debug("Assembly phase", { phase: next });
  }

  /**
   * Append a record, refusing references to anything not yet written
   */
  private append(...records: AnyRecord[]): void {
    for (const built of records) {
      for (const reference of collectReferences(built.resource)) {
        if (!this.written.has(reference)) {
          throw new GenerationError(
            `${built.resource.resourceType}/${built.id} references ${reference} before it is written`,
            { record: built.id, reference },
          );
        }
      }
      this.written.add(fullUrlOf(built.resource));
      this.records.push(built);
    }
  }

  private buildLegalEntities(): void {
    this.enter("legal-entities");
    this.sites = drawSites(this.config.biobanks, this.provider);
    this.legalEntities = this.sites.map((site, index) =>
      buildLegalEntity({ index, site }, this.provider),
    );
    this.append(...this.legalEntities);
  }

  private buildBiobanks(): void {
    this.enter("biobanks");
    this.biobanks = this.sites.map((site, index) =>
      buildBiobank(
        { index, site, legalEntity: this.legalEntityAt(index).resource },
        this.provider,
      ),
    );
    this.append(...this.biobanks);
  }

  private buildNetwork(): void {
    this.enter("network");
    const organization = buildNetworkOrganization(
      {
        legalEntity: this.legalEntityAt(0).resource,
        country: this.siteAt(0).country,
      },
      this.provider,
    );
    this.append(organization);
    this.append(
      buildNetwork(
        {
          networkOrganization: organization.resource,
          biobanks: this.biobanks.map((biobank) => biobank.resource),
        },
        this.provider,
      ),
    );
  }

  private buildCollections(): void {
    this.enter("collections");
    const subjects = donorsPerCollection(this.config.donors, this.config.collections);

    for (let i = 0; i < this.config.collections; i++) {
      const owner = i % this.config.biobanks;
      const biobank = this.biobankAt(owner);
      const name = COLLECTION_NAMES[i % COLLECTION_NAMES.length] ?? `Collection ${i + 1}`;

      const organization = buildCollectionOrganization(
        { index: i, name, biobank: biobank.resource, country: this.siteAt(owner).country },
        this.provider,
      );
      this.append(organization);

      const collection = buildCollection(
        {
          index: i,
          name: `Collection ${String(i + 1).padStart(3, "0")}`,
          collectionOrganization: organization.resource,
          numberOfSubjects: subjects[i] ?? 0,
        },
        this.provider,
      );
      this.append(collection);

      this.collections.push({
        identifier: `bbmri-eric:ID:${biobank.id}:collection:${collection.id}`,
        biobank,
      });
    }
  }

  private buildDonors(): void {
    this.enter("donors");
    const options = {
      minSpecimens: this.config.minSpecimensPerDonor,
      maxSpecimens: this.config.maxSpecimensPerDonor,
      observationProbability: this.config.observationProbability,
      deceasedProbability: this.config.deceasedProbability,
    };

    for (let d = 0; d < this.config.donors; d++) {
      const slot = this.collectionAt(collectionIndexFor(d, this.config.collections));
      const branch = buildDonorBranch(
        { index: d, collectionIdentifier: slot.identifier, biobank: slot.biobank.resource },
        this.provider,
        options,
      );
      this.append(...branchRecords(branch));
    }
  }

  private siteAt(index: number): Site {
    return this.at(this.sites, index, "site");
  }

  private legalEntityAt(index: number): BuiltRecord<"legal-entity"> {
    return this.at(this.legalEntities, index, "legal entity");
  }

  private biobankAt(index: number): BuiltRecord<"biobank"> {
    return this.at(this.biobanks, index, "biobank");
  }

  private collectionAt(index: number): CollectionSlot {
    return this.at(this.collections, index, "collection");
  }

  private at<T>(items: readonly T[], index: number, what: string): T {
    const item = items[index];
    if (item === undefined) {
      throw new GenerationError(`No ${what} at index ${index} in phase "${this.phase}"`);
    }
    return item;
  }
}

/**
 * Assemble the full hierarchy for one run
 */
export function assembleHierarchy(
  config: GeneratorConfig,
  provider: FactProvider,
): AssembledHierarchy {
  return new HierarchyAssembler(config, provider).assemble();
}
