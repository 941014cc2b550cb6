import { describe, it, expect } from 'vitest';
import { countResources, createRunReport } from '../../../src/lib/reporter/index.js';
import { emitBundle } from '../../../src/lib/emitter/bundle-emitter.js';
import type { TransactionBundle } from '../../../src/types/bundle.js';
import { smallHierarchy } from '../../helpers/fixtures.js';

describe('Run Reporter', () => {
  it('should count an empty bundle as nothing', () => {
    const empty: TransactionBundle = {
      resourceType: 'Bundle',
      id: 'empty',
      type: 'transaction',
      entry: [],
    };
    expect(countResources(empty)).toEqual({});
  });

  it('should count resources by type', () => {
    const hierarchy = smallHierarchy(11, { minSpecimensPerDonor: 2, maxSpecimensPerDonor: 2 });
    const counts = countResources(emitBundle(hierarchy));

    // 1 legal entity, 1 biobank, 1 network org, 1 collection org
    expect(counts).toEqual({
      Organization: 4,
      Group: 2,
      Patient: 3,
      Condition: 3,
      Specimen: 6,
      DiagnosticReport: 3,
      Observation: 6,
    });
  });

  it('should list types in a fixed order', () => {
    const counts = countResources(emitBundle(smallHierarchy()));
    expect(Object.keys(counts)).toEqual([
      'Organization',
      'Group',
      'Patient',
      'Condition',
      'Specimen',
      'DiagnosticReport',
      'Observation',
    ]);
  });

  it('should disclose the seed and the output', () => {
    const hierarchy = smallHierarchy(5);
    const bundle = emitBundle(hierarchy);
    const report = createRunReport(
      bundle,
      hierarchy.config,
      { seed: 5, source: 'provided' },
      { destination: 'out.json', bytes: 10, sha256: 'abc' },
    );

    expect(report).toEqual({
      status: 'success',
      phase: 'generation',
      seed: 5,
      seedSource: 'provided',
      config: hierarchy.config,
      counts: countResources(bundle),
      total: bundle.entry.length,
      output: { path: 'out.json', bytes: 10, sha256: 'abc' },
    });
  });
});
