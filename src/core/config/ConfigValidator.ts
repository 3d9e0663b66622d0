import Ajv, { ErrorObject } from 'ajv';
import { LightSourceConfig } from '../types/LightSourceState';

const ajv = new Ajv({ allErrors: true, strictNumbers: true });

const configProperties = {
  wavelength: { type: 'number', exclusiveMinimum: 0 },
  maxPower: { type: 'number', exclusiveMinimum: 0 },
  stabilityTarget: { type: 'number', exclusiveMinimum: 0, maximum: 1 },
  warmupTime: { type: 'number', minimum: 0 },
  calibrationInterval: { type: 'number', minimum: 0 }
};

// Schema for a configuration file or override set
const partialConfigSchema = {
  type: 'object',
  additionalProperties: false,
  properties: configProperties
};

// Schema for the merged configuration
const configSchema = {
  ...partialConfigSchema,
  required: Object.keys(configProperties)
};

const validatePartial = ajv.compile<Partial<LightSourceConfig>>(partialConfigSchema);
const validateComplete = ajv.compile<LightSourceConfig>(configSchema);

export interface ConfigValidationResult {
  valid: boolean;
  issues: string[];
}

function formatIssues(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map(error => {
    const path = error.instancePath.replace(/^\//, '');
    switch (error.keyword) {
      case 'required':
        return `Missing required field: ${error.params.missingProperty}`;
      case 'additionalProperties':
        return `Unknown field: ${error.params.additionalProperty}`;
      case 'type':
        return `Invalid type for ${path}: expected ${error.params.type}`;
      case 'minimum':
        return `Invalid value for ${path}: must be at least ${error.params.limit}`;
      case 'exclusiveMinimum':
        return `Invalid value for ${path}: must be greater than ${error.params.limit}`;
      case 'maximum':
        return `Invalid value for ${path}: must be at most ${error.params.limit}`;
      default:
        return `Validation error for ${path}: ${error.message}`;
    }
  });
}

export function validateLightSourceConfig(config: unknown): ConfigValidationResult {
  if (validateComplete(config)) {
    return { valid: true, issues: [] };
  }
  return { valid: false, issues: formatIssues(validateComplete.errors) };
}

export function isPartialLightSourceConfig(value: unknown): value is Partial<LightSourceConfig> {
  return validatePartial(value);
}

export function partialConfigIssues(value: unknown): string[] {
  return validatePartial(value) ? [] : formatIssues(validatePartial.errors);
}
