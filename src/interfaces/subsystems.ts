import {
  EmissionParameters,
  PerformanceMetrics,
  SubsystemStatus
} from '../core/types/LightSourceState';

/**
 * Jet (emission medium) subsystem
 */
export interface JetSubsystem {
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  calibrate(): Promise<boolean>;
  configureEmission(params: EmissionParameters): Promise<void>;
  getStatus(): Promise<SubsystemStatus>;
}

/**
 * Power optimizer subsystem
 */
export interface OptimizerSubsystem {
  warmUp(): Promise<void>;
  shutdown(): Promise<void>;
  calibrate(): Promise<boolean>;
  startRealTimeOptimization(): Promise<void>;
  stopRealTimeOptimization(): Promise<void>;
  adjustPower(power: number): Promise<boolean>;
  prepareForPower(targetPower: number): Promise<void>;
  configureOptimization(params: EmissionParameters): Promise<void>;
  getStatus(): Promise<SubsystemStatus>;
}

/**
 * Performance monitor
 */
export interface Monitor {
  calibrateSensors(): Promise<boolean>;
  startPowerMonitoring(): Promise<void>;
  stopPowerMonitoring(): Promise<void>;
  configureMonitoring(params: EmissionParameters): Promise<void>;
  getCurrentMetrics(): Promise<PerformanceMetrics>;
  getStatus(): Promise<SubsystemStatus>;
}

/**
 * Collaborators driven by the controller
 */
export interface LightSourceSubsystems {
  jet: JetSubsystem;
  optimizer: OptimizerSubsystem;
  monitor: Monitor;
}

export type SubsystemName = keyof LightSourceSubsystems;
