import {
  EmissionParameters,
  PerformanceMetrics,
  SubsystemStatus
} from '../core/types/LightSourceState';
import { JetSubsystem, Monitor, OptimizerSubsystem } from '../interfaces/subsystems';
import { delay } from '../utils/timing';

export interface SimulationConfig {
  latency: number;
  failOperations: string[];
  calibrationResult: boolean;
  recordCalls: boolean;
}

/**
 * Shared latency and failure injection for simulated collaborators
 */
export abstract class SubsystemSimulator {
  protected readonly config: SimulationConfig;
  private readonly recorded: string[] = [];

  constructor(config?: Partial<SimulationConfig>) {
    this.config = {
      latency: config?.latency ?? 0,
      failOperations: [...(config?.failOperations ?? [])],
      calibrationResult: config?.calibrationResult ?? true,
      recordCalls: config?.recordCalls ?? false
    };
  }

  // Operations invoked so far; empty unless recordCalls is set
  get calls(): readonly string[] {
    return this.recorded;
  }

  clearCalls(): void {
    this.recorded.length = 0;
  }

  // Utility methods for testing
  failOn(operation: string): void {
    this.config.failOperations.push(operation);
  }

  setCalibrationResult(result: boolean): void {
    this.config.calibrationResult = result;
  }

  protected async simulate(operation: string): Promise<void> {
    if (this.config.recordCalls) {
      this.recorded.push(operation);
    }
    await delay(this.config.latency);
    if (this.config.failOperations.includes(operation)) {
      throw new Error(`Simulated ${operation} failure`);
    }
  }
}

export class SimulatedJetSubsystem extends SubsystemSimulator implements JetSubsystem {
  private initialized = false;
  private params?: EmissionParameters;

  async initialize(): Promise<void> {
    await this.simulate('initialize');
    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    await this.simulate('shutdown');
    this.initialized = false;
    this.params = undefined;
  }

  async calibrate(): Promise<boolean> {
    await this.simulate('calibrate');
    return this.config.calibrationResult;
  }

  async configureEmission(params: EmissionParameters): Promise<void> {
    await this.simulate('configureEmission');
    this.params = { ...params };
  }

  async getStatus(): Promise<SubsystemStatus> {
    await this.simulate('getStatus');
    return {
      status: this.initialized ? 'normal' : 'offline',
      details: this.params ? { power: this.params.power } : undefined
    };
  }
}

export class SimulatedOptimizerSubsystem extends SubsystemSimulator implements OptimizerSubsystem {
  private optimizing = false;
  private targetPower = 0;
  private adjustResult = true;

  setAdjustResult(result: boolean): void {
    this.adjustResult = result;
  }

  async warmUp(): Promise<void> {
    await this.simulate('warmUp');
  }

  async shutdown(): Promise<void> {
    await this.simulate('shutdown');
    this.optimizing = false;
    this.targetPower = 0;
  }

  async calibrate(): Promise<boolean> {
    await this.simulate('calibrate');
    return this.config.calibrationResult;
  }

  async startRealTimeOptimization(): Promise<void> {
    await this.simulate('startRealTimeOptimization');
    this.optimizing = true;
  }

  async stopRealTimeOptimization(): Promise<void> {
    await this.simulate('stopRealTimeOptimization');
    this.optimizing = false;
  }

  async adjustPower(power: number): Promise<boolean> {
    await this.simulate('adjustPower');
    if (this.adjustResult) {
      this.targetPower = power;
    }
    return this.adjustResult;
  }

  async prepareForPower(targetPower: number): Promise<void> {
    await this.simulate('prepareForPower');
    this.targetPower = targetPower;
  }

  async configureOptimization(params: EmissionParameters): Promise<void> {
    await this.simulate('configureOptimization');
    this.targetPower = params.power;
  }

  async getStatus(): Promise<SubsystemStatus> {
    await this.simulate('getStatus');
    return {
      status: this.optimizing ? 'optimizing' : 'idle',
      details: { targetPower: this.targetPower }
    };
  }
}

export class SimulatedMonitor extends SubsystemSimulator implements Monitor {
  private monitoring = false;
  private stability = 0.99;

  setStability(stability: number): void {
    this.stability = stability;
  }

  async calibrateSensors(): Promise<boolean> {
    await this.simulate('calibrateSensors');
    return this.config.calibrationResult;
  }

  async startPowerMonitoring(): Promise<void> {
    await this.simulate('startPowerMonitoring');
    this.monitoring = true;
  }

  async stopPowerMonitoring(): Promise<void> {
    await this.simulate('stopPowerMonitoring');
    this.monitoring = false;
  }

  async configureMonitoring(_params: EmissionParameters): Promise<void> {
    await this.simulate('configureMonitoring');
  }

  async getCurrentMetrics(): Promise<PerformanceMetrics> {
    await this.simulate('getCurrentMetrics');
    return { stability: this.stability };
  }

  async getStatus(): Promise<SubsystemStatus> {
    await this.simulate('getStatus');
    return { status: this.monitoring ? 'monitoring' : 'idle' };
  }
}

// Factory for a full set of simulated collaborators
export function createSimulatedSubsystems(options?: Partial<SimulationConfig>) {
  return {
    jet: new SimulatedJetSubsystem(options),
    optimizer: new SimulatedOptimizerSubsystem(options),
    monitor: new SimulatedMonitor(options)
  };
}
