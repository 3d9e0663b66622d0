import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { LightSourceConfig } from '../types/LightSourceState';
import { ConfigurationError, describeError } from '../errors/LightSourceError';
import {
  isPartialLightSourceConfig,
  partialConfigIssues,
  validateLightSourceConfig
} from './ConfigValidator';

export const DEFAULT_LIGHT_SOURCE_CONFIG: Readonly<LightSourceConfig> = Object.freeze({
  wavelength: 5.8e-9,        // 5.8 nm
  maxPower: 5.0e-9,          // 5 nW
  stabilityTarget: 0.01,
  warmupTime: 30,
  calibrationInterval: 3600
});

/**
 * Merge overrides onto the defaults and freeze the result
 */
export function createLightSourceConfig(
  overrides: Partial<LightSourceConfig> = {}
): Readonly<LightSourceConfig> {
  const config: LightSourceConfig = {
    ...DEFAULT_LIGHT_SOURCE_CONFIG,
    ...overrides
  };

  const validation = validateLightSourceConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(
      `Invalid light source configuration: ${validation.issues.join('; ')}`,
      validation.issues
    );
  }

  return Object.freeze(config);
}

/**
 * Load configuration from a YAML or JSON file
 */
export async function loadLightSourceConfig(filePath: string): Promise<Readonly<LightSourceConfig>> {
  let document: unknown;
  try {
    const content = await readFile(filePath, 'utf-8');
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read configuration from ${filePath}: ${describeError(error)}`
    );
  }

  // Empty file means defaults
  if (document === undefined || document === null) {
    return createLightSourceConfig();
  }

  if (!isPartialLightSourceConfig(document)) {
    const issues = partialConfigIssues(document);
    throw new ConfigurationError(
      `Invalid configuration in ${filePath}: ${issues.join('; ')}`,
      issues
    );
  }

  return createLightSourceConfig(document);
}
