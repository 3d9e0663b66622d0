/**
 * Light source operational state
 */
export enum LightSourceState {
  OFF = 'off',
  STANDBY = 'standby',
  CALIBRATING = 'calibrating',
  READY = 'ready',
  EMITTING = 'emitting',
  ERROR = 'error'
}

/**
 * Output modes derived from emission parameters
 */
export enum OutputMode {
  CONTINUOUS = 'continuous',
  PULSED = 'pulsed',
  BURST = 'burst'
}

/**
 * Immutable controller configuration
 */
export interface LightSourceConfig {
  wavelength: number;          // meters
  maxPower: number;            // watts
  stabilityTarget: number;     // fraction in (0, 1]
  warmupTime: number;          // seconds
  calibrationInterval: number; // seconds, 0 disables the due flag
}

/**
 * Per-emission request
 */
export interface EmissionParameters {
  power: number;      // watts
  duration: number;   // seconds, 0 = continuous
  frequency: number;  // Hz
  dutyCycle: number;  // fraction in (0, 1]
}

export type PerformanceMetrics = Record<string, number>;

export interface SubsystemStatus {
  status: string;
  details?: Record<string, unknown>;
}

export interface LightSourceStatus {
  state: LightSourceState;
  currentPower: number;
  operatingTime: number;
  wavelength: number;
  outputMode?: OutputMode;
  performanceMetrics: PerformanceMetrics;
  subsystemStatus: {
    jet: SubsystemStatus;
    optimizer: SubsystemStatus;
    monitor: SubsystemStatus;
  };
  lastCalibrationAt?: number;
  calibrationDue: boolean;
}

export default LightSourceState;
