/**
 * Group builders: the network roster and the sample collection
 */

import type { GroupCharacteristic } from "../../types/fhir.js";
import type { BuiltRecord } from "../../types/records.js";
import type { FactProvider } from "../random/fact-provider.js";
import { assignId, referenceTo, type ResourceHandle } from "../identity/ids.js";
import { CodeSystems, Extensions, Profiles } from "../registries/systems.js";
import {
  CollectionSampleTypes,
  InclusionCriteria,
  Sexes,
  StorageTemperatures,
} from "../registries/value-sets.js";
import { bbmriIdentifier, codedExtension, concept, narrative, record } from "./common.js";
import { NETWORK_NAME } from "./organizations.js";

export interface NetworkContext {
  networkOrganization: ResourceHandle;
  biobanks: readonly ResourceHandle[];
}

export function buildNetwork(
  { networkOrganization, biobanks }: NetworkContext,
  _provider: FactProvider,
): BuiltRecord<"network"> {
  const id = assignId("network", 0);

  return record("network", [0], {
    resourceType: "Group",
    id,
    meta: { profile: [Profiles.network] },
    identifier: [bbmriIdentifier(id)],
    active: true,
    type: "person",
    actual: false,
    name: NETWORK_NAME,
    managingEntity: referenceTo(networkOrganization),
    extension: biobanks.map((biobank) => ({
      url: Extensions.groupMemberEntity,
      valueReference: referenceTo(biobank),
    })),
    text: narrative("Group", id, `Network with ${biobanks.length} biobanks.`),
  });
}

function characteristic(
  code: string,
  value: Omit<GroupCharacteristic, "code" | "exclude">,
): GroupCharacteristic {
  return {
    code: { coding: [{ system: CodeSystems.characteristic, code }] },
    ...value,
    exclude: false,
  };
}

// Storage temperatures a collection may advertise; "Other" is left out
const ADVERTISED_TEMPERATURES = StorageTemperatures.values.slice(0, 5);

export interface CollectionContext {
  index: number;
  name: string;
  collectionOrganization: ResourceHandle;
  numberOfSubjects: number;
}

export function buildCollection(
  { index, name, collectionOrganization, numberOfSubjects }: CollectionContext,
  provider: FactProvider,
): BuiltRecord<"collection"> {
  const id = assignId("collection", index);
  const maxAge = provider.integerInRange(75, 95);
  const temperatures = provider.sample(ADVERTISED_TEMPERATURES, 2);
  const materials = provider.sample(CollectionSampleTypes.values, 2);
  const criterion = provider.choice(InclusionCriteria.values);

  const characteristics: GroupCharacteristic[] = [
    characteristic("Age", {
      valueRange: {
        low: { value: 18, unit: "years" },
        high: { value: maxAge, unit: "years" },
      },
    }),
    ...Sexes.values.map((sex) =>
      characteristic("Sex", { valueCodeableConcept: concept(Sexes, sex) }),
    ),
    ...temperatures.map((temperature) =>
      characteristic("StorageTemperature", {
        valueCodeableConcept: concept(StorageTemperatures, temperature, true),
      }),
    ),
    ...materials.map((material) =>
      characteristic("MaterialType", {
        valueCodeableConcept: concept(CollectionSampleTypes, material),
      }),
    ),
    characteristic("Diagnosis", {
      valueCodeableConcept: {
        coding: [{ system: CodeSystems.icd10, code: "C00-C97", display: "Malignant neoplasms" }],
      },
    }),
  ];

  return record("collection", [index], {
    resourceType: "Group",
    id,
    meta: { profile: [Profiles.collection] },
    identifier: [bbmriIdentifier(id)],
    active: true,
    type: "person",
    actual: true,
    name,
    managingEntity: referenceTo(collectionOrganization),
    characteristic: characteristics,
    extension: [
      { url: Extensions.numberOfSubjects, valueInteger: numberOfSubjects },
      codedExtension(Extensions.inclusionCriteria, InclusionCriteria, criterion),
    ],
    text: narrative("Group", id, `Collection with ${numberOfSubjects} subjects.`),
  });
}
