// Types
export * from './core/types/LightSourceState';
export * from './interfaces/subsystems';

// Errors
export * from './core/errors/LightSourceError';

// Configuration
export {
  DEFAULT_LIGHT_SOURCE_CONFIG,
  createLightSourceConfig,
  loadLightSourceConfig
} from './core/config/LightSourceConfig';
export { validateLightSourceConfig } from './core/config/ConfigValidator';
export type { ConfigValidationResult } from './core/config/ConfigValidator';

// Safety
export * from './core/safety/ParameterValidator';
export { ALLOWED_TRANSITIONS, canTransition } from './core/state/transitions';

// Events
export * from './core/events/LightSourceEventBus';

// Core Components
export {
  LightSourceController,
  WARMUP_RAMP,
  NOMINAL_WARMUP_SECONDS
} from './core/LightSourceController';
export type { LightSourceControllerOptions, WarmupStep } from './core/LightSourceController';
export { ControllerMetrics } from './core/metrics/ControllerMetrics';
export { Logger } from './core/logging/Logger';
export type { LoggerConfig } from './core/logging/Logger';

// Simulation
export * from './testing/SubsystemSimulator';

// Default export
export { LightSourceController as default } from './core/LightSourceController';
