/**
 * Small hierarchies shared by emitter, reporter and integration tests
 */

import { assembleHierarchy, type AssembledHierarchy } from '../../src/lib/assembler/hierarchy-assembler.js';
import { FactProvider } from '../../src/lib/random/fact-provider.js';
import { resolveConfig } from '../../src/utils/config-loader.js';
import type { GeneratorConfigInput } from '../../src/types/config.js';

export function smallHierarchy(seed = 1, overrides: GeneratorConfigInput = {}): AssembledHierarchy {
  const config = resolveConfig({ donors: 3, output: 'stdout', seed, ...overrides });
  return assembleHierarchy(config, new FactProvider(seed));
}
