/**
 * Bundle property tests over whole generated bundles
 */

import { describe, it, expect } from 'vitest';
import { generateBundle } from '../../src/lib/generator/bundle-generator.js';
import { countResources } from '../../src/lib/reporter/index.js';
import { collectReferences } from '../../src/lib/identity/ids.js';
import { CodeSystems, Extensions, Profiles } from '../../src/lib/registries/systems.js';
import { ALL_REGISTRIES, DatasetTypes, codeSet } from '../../src/lib/registries/value-sets.js';
import { resolveConfig } from '../../src/utils/config-loader.js';
import type { TransactionBundle } from '../../src/types/bundle.js';
import type { Coding } from '../../src/types/fhir.js';
import type { GeneratorConfigInput } from '../../src/types/config.js';

function generate(input: GeneratorConfigInput): TransactionBundle {
  return generateBundle(resolveConfig({ output: 'stdout', ...input })).bundle;
}

function isCoding(node: object): node is Coding {
  return 'system' in node && 'code' in node && typeof node.code === 'string';
}

function codings(value: unknown): Coding[] {
  const found: Coding[] = [];
  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
    } else if (node !== null && typeof node === 'object') {
      if (isCoding(node)) found.push(node);
      Object.values(node).forEach(visit);
    }
  };
  visit(value);
  return found;
}

const configurations: GeneratorConfigInput[] = [
  { donors: 10, seed: 42 },
  { donors: 30, biobanks: 3, collections: 5, seed: 3 },
  { donors: 8, biobanks: 20, collections: 8, seed: 9, observationProbability: 0.3 },
];

describe('Bundle Properties', () => {
  it.each(configurations)('should only reference earlier entries (%o)', (input) => {
    const bundle = generate(input);
    const seen = new Set<string>();

    for (const entry of bundle.entry) {
      for (const reference of collectReferences(entry.resource)) {
        expect(seen.has(reference)).toBe(true);
      }
      seen.add(entry.fullUrl);
    }
  });

  it.each(configurations)('should give each donor one diagnosis and one report (%o)', (input) => {
    const bundle = generate(input);
    const config = resolveConfig({ output: 'stdout', ...input });
    const perDonor = new Map<string, { diagnoses: number; reports: number; specimens: number }>();

    for (const { fullUrl, resource } of bundle.entry) {
      if (resource.resourceType === 'Patient') {
        perDonor.set(fullUrl, { diagnoses: 0, reports: 0, specimens: 0 });
        continue;
      }
      if (
        resource.resourceType !== 'Condition' &&
        resource.resourceType !== 'DiagnosticReport' &&
        resource.resourceType !== 'Specimen'
      ) {
        continue;
      }
      const tally = perDonor.get(resource.subject.reference);
      expect(tally).toBeDefined();
      if (!tally) continue;
      if (resource.resourceType === 'Condition') tally.diagnoses++;
      else if (resource.resourceType === 'DiagnosticReport') tally.reports++;
      else tally.specimens++;
    }

    expect(perDonor.size).toBe(config.donors);
    for (const tally of perDonor.values()) {
      expect(tally.diagnoses).toBe(1);
      expect(tally.reports).toBe(1);
      expect(tally.specimens).toBeGreaterThanOrEqual(config.minSpecimensPerDonor);
      expect(tally.specimens).toBeLessThanOrEqual(config.maxSpecimensPerDonor);
    }
  });

  it('should give each specimen at most one observation', () => {
    const bundle = generate({ donors: 20, seed: 5, observationProbability: 0.5 });
    const observed = bundle.entry.flatMap(({ resource }) =>
      resource.resourceType === 'Observation' ? [resource.specimen.reference] : [],
    );

    expect(new Set(observed).size).toBe(observed.length);
  });

  it.each(configurations)('should draw every coded value from its registry (%o)', (input) => {
    const bundle = generate(input);
    const registered = new Map<string, Set<string>>();
    for (const source of ALL_REGISTRIES) {
      const codes = registered.get(source.system) ?? new Set<string>();
      for (const code of codeSet(source)) codes.add(code);
      registered.set(source.system, codes);
    }

    const checked = codings(bundle).filter((coding) => registered.has(coding.system));
    expect(checked.length).toBeGreaterThan(0);
    for (const coding of checked) {
      // Collection-level diagnosis range, not a single code
      if (coding.code === 'C00-C97') continue;
      expect(registered.get(coding.system)?.has(coding.code)).toBe(true);
    }

    const characteristics = codings(bundle).filter(
      (coding) => coding.system === CodeSystems.characteristic,
    );
    for (const coding of characteristics) {
      expect(['Age', 'Sex', 'StorageTemperature', 'MaterialType', 'Diagnosis']).toContain(
        coding.code,
      );
    }

    const datasetTypes = codeSet(DatasetTypes);
    for (const { resource } of bundle.entry) {
      if (resource.resourceType !== 'Patient') continue;
      for (const extension of resource.extension) {
        expect(extension.url).toBe(Extensions.datasetType);
        expect(datasetTypes.has(extension.valueCode ?? '')).toBe(true);
      }
    }
  });

  it('should give every collection at least one donor', () => {
    const bundle = generate({ donors: 7, biobanks: 2, collections: 7, seed: 12 });
    const collectionIds = bundle.entry.flatMap(({ resource }) =>
      resource.resourceType === 'Group' && resource.meta?.profile[0] === Profiles.collection
        ? [resource.id]
        : [],
    );
    const held = new Set(
      bundle.entry.flatMap(({ resource }) =>
        resource.resourceType === 'Specimen'
          ? resource.extension.flatMap((extension) =>
              extension.valueIdentifier ? [extension.valueIdentifier.value] : [],
            )
          : [],
      ),
    );

    expect(collectionIds).toHaveLength(7);
    for (const id of collectionIds) {
      expect([...held].some((identifier) => identifier.endsWith(`:collection:${id}`))).toBe(true);
    }
  });

  it('should carry a profile on every profiled kind', () => {
    const bundle = generate({ donors: 4, seed: 8 });
    const unprofiled = bundle.entry.filter(({ resource }) => resource.meta === undefined);

    expect(unprofiled.map(({ resource }) => resource.id)).toEqual([
      'juristic-person-001',
      'diagreport-000001',
      'diagreport-000002',
      'diagreport-000003',
      'diagreport-000004',
    ]);
  });

  describe('seed 42, ten donors, one biobank, one collection', () => {
    const bundle = generate({ donors: 10, biobanks: 1, collections: 1, seed: 42 });
    const counts = countResources(bundle);

    it('should hold the fixed organizational records', () => {
      const organizations = bundle.entry.filter(
        ({ resource }) => resource.resourceType === 'Organization',
      );
      expect(counts.Organization).toBe(4);
      expect(counts.Group).toBe(2);
      expect(organizations.map(({ resource }) => resource.meta?.profile[0])).toEqual([
        undefined,
        Profiles.biobank,
        Profiles.networkOrganization,
        Profiles.collectionOrganization,
      ]);
    });

    it('should hold one patient, condition and report per donor', () => {
      expect(counts.Patient).toBe(10);
      expect(counts.Condition).toBe(10);
      expect(counts.DiagnosticReport).toBe(10);
    });

    it('should hold one to three specimens per donor and one observation each', () => {
      const specimens = counts.Specimen ?? 0;
      expect(specimens).toBeGreaterThanOrEqual(10);
      expect(specimens).toBeLessThanOrEqual(30);
      expect(counts.Observation).toBe(specimens);
    });

    it('should post every entry as a transaction', () => {
      expect(bundle.type).toBe('transaction');
      for (const entry of bundle.entry) {
        expect(entry.request.method).toBe('POST');
        expect(entry.request.url).toBe(entry.resource.resourceType);
      }
    });
  });
});
