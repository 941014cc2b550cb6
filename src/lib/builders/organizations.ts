/**
 * Organization builders: juristic person, biobank, network organization and
 * collection organization
 */

import type { BuiltRecord } from "../../types/records.js";
import type { FactProvider } from "../random/fact-provider.js";
import { assignId, referenceTo, type ResourceHandle } from "../identity/ids.js";
import { Extensions, Profiles } from "../registries/systems.js";
import {
  AccessConditions,
  Capabilities,
  CollectionDatasetTypes,
  CollectionDesigns,
  QualityStandards,
  SampleSources,
} from "../registries/value-sets.js";
import { BIOBANK_SUFFIXES } from "../registries/places.js";
import { bbmriIdentifier, codedExtension, narrative, record } from "./common.js";
import type { Site } from "./sites.js";

export interface LegalEntityContext {
  index: number;
  site: Site;
}

export function buildLegalEntity(
  { index, site }: LegalEntityContext,
  _provider: FactProvider,
): BuiltRecord<"legal-entity"> {
  const id = assignId("legal-entity", index);
  const name = `${site.city} University`;

  return record("legal-entity", [index], {
    resourceType: "Organization",
    id,
    identifier: [bbmriIdentifier(id)],
    name,
    address: [{ city: site.city, country: site.country }],
    text: narrative("Organization", id, `${name}, ${site.city}, ${site.country}`),
  });
}

export interface BiobankContext {
  index: number;
  site: Site;
  legalEntity: ResourceHandle;
}

export function buildBiobank(
  { index, site, legalEntity }: BiobankContext,
  provider: FactProvider,
): BuiltRecord<"biobank"> {
  const id = assignId("biobank", index);
  const directoryId = `${site.country}_${id.toUpperCase()}`;
  const name = `${site.city} ${provider.choice(BIOBANK_SUFFIXES)}`;
  const capabilities = provider.sample(
    Capabilities.values,
    provider.integerInRange(1, Capabilities.values.length),
  );
  const contact = provider.personName();
  const standard = provider.choice(QualityStandards.values);

  return record("biobank", [index], {
    resourceType: "Organization",
    id,
    meta: { profile: [Profiles.biobank] },
    identifier: [bbmriIdentifier(directoryId)],
    name,
    alias: [id.toUpperCase()],
    telecom: [{ system: "url", value: `https://example.org/${id}` }],
    address: [{ city: site.city, country: site.country }],
    contact: [
      {
        name: { family: contact.family, given: [contact.given] },
        telecom: [{ system: "email", value: `contact@${id}.example.org` }],
      },
    ],
    partOf: referenceTo(legalEntity),
    extension: [
      ...capabilities.map((capability) =>
        codedExtension(Extensions.infrastructuralCapabilities, Capabilities, capability),
      ),
      { url: Extensions.qualityManagementStandard, valueString: standard.code },
      {
        url: Extensions.organizationDescription,
        valueString: `${name} is a biobank facility providing high-quality biospecimens and data for research.`,
      },
    ],
    text: narrative(
      "Organization",
      id,
      `${name}, ${site.city}, ${site.country}. BBMRI-ERIC ID: ${directoryId}.`,
    ),
  });
}

export interface NetworkOrganizationContext {
  legalEntity: ResourceHandle;
  country: string;
}

export const NETWORK_NAME = "BBMRI-ERIC Network";

export function buildNetworkOrganization(
  { legalEntity, country }: NetworkOrganizationContext,
  provider: FactProvider,
): BuiltRecord<"network-organization"> {
  const id = assignId("network-organization", 0);
  const name = `${NETWORK_NAME} Organization`;
  const contact = provider.personName();

  return record("network-organization", [0], {
    resourceType: "Organization",
    id,
    meta: { profile: [Profiles.networkOrganization] },
    identifier: [bbmriIdentifier(id)],
    name,
    telecom: [{ system: "url", value: "https://example.org/network" }],
    address: [{ country }],
    contact: [
      {
        name: { family: contact.family, given: [contact.given] },
        telecom: [{ system: "email", value: "network@example.org" }],
      },
    ],
    partOf: referenceTo(legalEntity),
    extension: [
      {
        url: Extensions.organizationDescription,
        valueString: `${name} coordinates biobank collaboration across multiple institutions.`,
      },
    ],
    text: narrative("Organization", id, name),
  });
}

export interface CollectionOrganizationContext {
  index: number;
  name: string;
  biobank: ResourceHandle;
  country: string;
}

export function buildCollectionOrganization(
  { index, name, biobank, country }: CollectionOrganizationContext,
  provider: FactProvider,
): BuiltRecord<"collection-organization"> {
  const id = assignId("collection-organization", index);
  const design = provider.choice(CollectionDesigns.values);
  const datasetType = provider.choice(CollectionDatasetTypes.values);
  const access = provider.choice(AccessConditions.values);
  const contact = provider.personName();
  const [source] = SampleSources.values;

  return record("collection-organization", [index], {
    resourceType: "Organization",
    id,
    meta: { profile: [Profiles.collectionOrganization] },
    identifier: [bbmriIdentifier(id)],
    name,
    alias: [id.toUpperCase().slice(0, 10)],
    active: true,
    telecom: [{ system: "url", value: `https://example.org/${id}` }],
    address: [{ country }],
    contact: [
      {
        name: { family: contact.family, given: [contact.given] },
        telecom: [{ system: "email", value: `pi@${id}.example.org` }],
      },
    ],
    partOf: referenceTo(biobank),
    extension: [
      {
        url: Extensions.organizationDescription,
        valueString: `Collection of biospecimens: ${name}.`,
      },
      codedExtension(Extensions.collectionDesign, CollectionDesigns, design),
      ...(source ? [codedExtension(Extensions.sampleSource, SampleSources, source)] : []),
      codedExtension(Extensions.collectionDatasetType, CollectionDatasetTypes, datasetType),
      codedExtension(Extensions.useAndAccessConditions, AccessConditions, access),
    ],
    text: narrative("Organization", id, `${name}, part of ${biobank.resourceType}/${biobank.id}.`),
  });
}
