import { describe, it, expect } from 'vitest';
import { FactProvider } from '../../../src/lib/random/fact-provider.js';
import { buildCollection, buildNetwork } from '../../../src/lib/builders/groups.js';
import { narrative } from '../../../src/lib/builders/common.js';
import { handleOf, referenceTo } from '../../../src/lib/identity/ids.js';
import { Extensions, Profiles } from '../../../src/lib/registries/systems.js';
import {
  CollectionSampleTypes,
  InclusionCriteria,
  StorageTemperatures,
  codeSet,
} from '../../../src/lib/registries/value-sets.js';

describe('buildNetwork', () => {
  it('should list every biobank as a member', () => {
    const networkOrganization = handleOf('network-organization', 0);
    const biobanks = [handleOf('biobank', 0), handleOf('biobank', 1)];
    const { resource } = buildNetwork({ networkOrganization, biobanks }, new FactProvider(1));

    expect(resource).toEqual({
      resourceType: 'Group',
      id: 'network-001',
      meta: { profile: [Profiles.network] },
      identifier: [{ system: 'http://www.bbmri-eric.eu/', value: 'bbmri-eric:ID:network-001' }],
      active: true,
      type: 'person',
      actual: false,
      name: 'BBMRI-ERIC Network',
      managingEntity: referenceTo(networkOrganization),
      extension: biobanks.map((biobank) => ({
        url: Extensions.groupMemberEntity,
        valueReference: referenceTo(biobank),
      })),
      text: narrative('Group', 'network-001', 'Network with 2 biobanks.'),
    });
  });
});

describe('buildCollection', () => {
  const collectionOrganization = handleOf('collection-organization', 0);

  function build(seed: number) {
    return buildCollection(
      { index: 0, name: 'Collection 001', collectionOrganization, numberOfSubjects: 4 },
      new FactProvider(seed),
    ).resource;
  }

  it('should be managed by its collection organization', () => {
    const resource = build(1);
    expect(resource.id).toBe('collection-001');
    expect(resource.actual).toBe(true);
    expect(resource.managingEntity).toEqual(referenceTo(collectionOrganization));
    expect(resource.extension[0]).toEqual({ url: Extensions.numberOfSubjects, valueInteger: 4 });
    expect(resource.text.div).toContain('Collection with 4 subjects.');
  });

  it('should describe age, sex, storage, material and diagnosis', () => {
    const resource = build(2);
    const codes = (resource.characteristic ?? []).map((c) => c.code.coding[0]?.code);
    expect(codes).toEqual([
      'Age',
      'Sex',
      'Sex',
      'StorageTemperature',
      'StorageTemperature',
      'MaterialType',
      'MaterialType',
      'Diagnosis',
    ]);
  });

  it('should draw characteristic values from their registries', () => {
    for (let seed = 0; seed < 10; seed++) {
      const characteristics = build(seed).characteristic ?? [];
      const valueOf = (code: string) =>
        characteristics
          .filter((c) => c.code.coding[0]?.code === code)
          .map((c) => c.valueCodeableConcept?.coding[0]?.code ?? '');

      const temperatures = valueOf('StorageTemperature');
      expect(new Set(temperatures).size).toBe(2);
      for (const code of temperatures) {
        expect(codeSet(StorageTemperatures).has(code)).toBe(true);
        expect(code).not.toBe('Other');
      }
      for (const code of valueOf('MaterialType')) {
        expect(codeSet(CollectionSampleTypes).has(code)).toBe(true);
      }

      const high = characteristics[0]?.valueRange?.high.value ?? 0;
      expect(high).toBeGreaterThanOrEqual(75);
      expect(high).toBeLessThanOrEqual(95);
    }
  });

  it('should record a registered inclusion criterion', () => {
    const criterion = build(3).extension[1];
    expect(criterion?.url).toBe(Extensions.inclusionCriteria);
    expect(codeSet(InclusionCriteria).has(criterion?.valueCodeableConcept?.coding[0]?.code ?? '')).toBe(true);
  });
});

describe('narrative', () => {
  it('should escape markup in the summary', () => {
    expect(narrative('Organization', 'biobank-001', 'Genomics & Tissue <Bank>')).toEqual({
      status: 'generated',
      div: '<div xmlns="http://www.w3.org/1999/xhtml"><p><b>Organization/biobank-001</b>: Genomics &amp; Tissue &lt;Bank&gt;</p></div>',
    });
  });
});
