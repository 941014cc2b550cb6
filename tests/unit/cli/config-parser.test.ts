import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadGenerateSection, parseConfigFile } from '../../../src/cli/config/parser.js';
import { toConfigInput } from '../../../src/cli/commands/generate.js';
import { IOFailureError, InvalidConfigurationError } from '../../../src/utils/errors.js';

describe('Config Parser', () => {
  let dir: string;

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'miabis-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read the generate section of a YAML file', () => {
    const file = write('config.yaml', 'generate:\n  donors: 12\n  biobanks: 2\n  seed: 42\n');
    expect(loadGenerateSection(file)).toEqual({ donors: 12, biobanks: 2, seed: 42 });
  });

  it('should read the generate section of a JSON file', () => {
    const file = write('config.json', JSON.stringify({ generate: { observationProbability: 0.5 } }));
    expect(loadGenerateSection(file)).toEqual({ observationProbability: 0.5 });
  });

  it('should treat a file without a generate section as empty', () => {
    const file = write('config.yml', 'other: true\n');
    expect(parseConfigFile(file)).toEqual({ generate: undefined });
    expect(loadGenerateSection(file)).toEqual({});
  });

  it('should reject unsupported extensions', () => {
    const file = write('config.toml', 'donors = 1');
    expect(() => parseConfigFile(file)).toThrow(InvalidConfigurationError);
    expect(() => parseConfigFile(file)).toThrow(
      `Unsupported config file format: ${file}. Must be .json, .yaml, or .yml`,
    );
  });

  it('should reject malformed content', () => {
    const file = write('config.json', '{ "generate": ');
    expect(() => parseConfigFile(file)).toThrow(`Failed to parse config file: ${file}`);
  });

  it('should reject a document that is not an object', () => {
    const file = write('config.yaml', '- 1\n- 2\n');
    expect(() => parseConfigFile(file)).toThrow(`Config file must contain an object: ${file}`);
  });

  it('should raise IOFailureError for a missing file', () => {
    expect(() => parseConfigFile(path.join(dir, 'absent.yaml'))).toThrow(IOFailureError);
  });

  it('should reject unknown fields', () => {
    const file = write('config.yaml', 'generate:\n  patients: 3\n');
    expect(() => loadGenerateSection(file)).toThrow(
      `Invalid configuration in ${file} at /: must NOT have additional properties`,
    );
  });

  it('should reject mistyped fields', () => {
    const file = write('config.yaml', 'generate:\n  donors: many\n');
    expect(() => loadGenerateSection(file)).toThrow(InvalidConfigurationError);
    expect(() => loadGenerateSection(file)).toThrow(`Invalid configuration in ${file} at /donors`);
  });
});

describe('toConfigInput', () => {
  it('should rename specimen and probability flags', () => {
    expect(
      toConfigInput({
        donors: 10,
        minSpecimens: 2,
        maxSpecimens: 4,
        observationProbability: 0.5,
        deceasedProbability: 0,
        config: 'ignored.yaml',
      }),
    ).toEqual({
      donors: 10,
      biobanks: undefined,
      collections: undefined,
      output: undefined,
      seed: undefined,
      minSpecimensPerDonor: 2,
      maxSpecimensPerDonor: 4,
      observationProbability: 0.5,
      deceasedProbability: 0,
    });
  });
});
