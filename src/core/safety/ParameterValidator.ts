import {
  EmissionParameters,
  LightSourceConfig,
  OutputMode
} from '../types/LightSourceState';
import { InvalidParameterError } from '../errors/LightSourceError';

export interface ParameterIssue {
  field: keyof EmissionParameters;
  message: string;
}

export interface ParameterValidationResult {
  valid: boolean;
  issues: ParameterIssue[];
}

function result(issues: ParameterIssue[]): ParameterValidationResult {
  return {
    valid: issues.length === 0,
    issues
  };
}

function checkPower(power: number, maxPower: number, issues: ParameterIssue[]): void {
  if (!Number.isFinite(power) || power <= 0 || power > maxPower) {
    issues.push({
      field: 'power',
      message: `Power ${power} W outside (0, ${maxPower}] W`
    });
  }
}

/**
 * Check a requested output power against the configured ceiling
 */
export function validatePowerLevel(power: number, maxPower: number): ParameterValidationResult {
  const issues: ParameterIssue[] = [];
  checkPower(power, maxPower, issues);
  return result(issues);
}

/**
 * Check emission parameters before any subsystem is touched
 */
export function validateEmissionParameters(
  params: EmissionParameters,
  config: Pick<LightSourceConfig, 'maxPower'>
): ParameterValidationResult {
  const issues: ParameterIssue[] = [];

  checkPower(params.power, config.maxPower, issues);

  if (!Number.isFinite(params.duration) || params.duration < 0) {
    issues.push({ field: 'duration', message: 'Duration cannot be negative' });
  }

  if (!Number.isFinite(params.frequency) || params.frequency < 0) {
    issues.push({ field: 'frequency', message: 'Frequency cannot be negative' });
  }

  if (!Number.isFinite(params.dutyCycle) || params.dutyCycle <= 0 || params.dutyCycle > 1) {
    issues.push({ field: 'dutyCycle', message: 'Duty cycle must be within (0, 1]' });
  }

  return result(issues);
}

export function assertEmissionParameters(
  params: EmissionParameters,
  config: Pick<LightSourceConfig, 'maxPower'>
): void {
  const [issue] = validateEmissionParameters(params, config).issues;
  if (issue) {
    throw new InvalidParameterError(issue.message, issue.field, params[issue.field]);
  }
}

export function resolveOutputMode(params: EmissionParameters): OutputMode {
  if (params.frequency === 0) {
    return OutputMode.CONTINUOUS;
  }
  return params.duration > 0 ? OutputMode.BURST : OutputMode.PULSED;
}
