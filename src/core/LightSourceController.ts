import { v4 as uuidv4 } from 'uuid';
import {
  EmissionParameters,
  LightSourceConfig,
  LightSourceState,
  LightSourceStatus,
  OutputMode,
  PerformanceMetrics,
  SubsystemStatus
} from './types/LightSourceState';
import {
  JetSubsystem,
  LightSourceSubsystems,
  Monitor,
  OptimizerSubsystem,
  SubsystemName
} from '../interfaces/subsystems';
import {
  ConfigurationError,
  EmergencyStopError,
  LightSourceError,
  PreconditionViolationError,
  SubsystemFailureError,
  describeError
} from './errors/LightSourceError';
import {
  EventListener,
  LightSourceEvent,
  LightSourceEventBus
} from './events/LightSourceEventBus';
import { validateLightSourceConfig } from './config/ConfigValidator';
import {
  assertEmissionParameters,
  resolveOutputMode,
  validatePowerLevel
} from './safety/ParameterValidator';
import { ALLOWED_TRANSITIONS, canTransition } from './state/transitions';
import { ControllerMetrics } from './metrics/ControllerMetrics';
import { Logger } from './logging/Logger';
import { delay, ensureNotAborted } from '../utils/timing';
import {
  SimulatedJetSubsystem,
  SimulatedMonitor,
  SimulatedOptimizerSubsystem
} from '../testing/SubsystemSimulator';

export interface WarmupStep {
  powerRatio: number;
  holdSeconds: number;
}

/**
 * Warmup ramp at the nominal warmup time. Hold times scale with
 * config.warmupTime / NOMINAL_WARMUP_SECONDS.
 */
export const WARMUP_RAMP: readonly WarmupStep[] = [
  { powerRatio: 0.1, holdSeconds: 5 },
  { powerRatio: 0.3, holdSeconds: 10 },
  { powerRatio: 0.6, holdSeconds: 10 },
  { powerRatio: 0.8, holdSeconds: 5 }
];

export const NOMINAL_WARMUP_SECONDS = 30;

export interface LightSourceControllerOptions {
  logger?: Logger;
  metrics?: ControllerMetrics;
}

interface Interruption {
  controller: AbortController;
  task?: Promise<boolean>;
}

interface ActiveEmission {
  id: string;
  params: EmissionParameters;
  mode: OutputMode;
  startedAt: number;
}

/**
 * Light Source Controller
 *
 * Supervises one emission device:
 * - Power-on with warmup ramp, and shutdown
 * - Calibration across jet, optimizer and sensors
 * - Emission start/stop with optional timed auto-stop
 * - Power adjustment within the configured ceiling
 *
 * Mutating operations must not overlap. powerOff and emergencyStop are the
 * exception: they interrupt an in-flight warmup or calibration.
 */
export class LightSourceController {
  private readonly config: Readonly<LightSourceConfig>;
  private readonly jet: JetSubsystem;
  private readonly optimizer: OptimizerSubsystem;
  private readonly monitor: Monitor;
  private readonly logger: Logger;
  private readonly metrics: ControllerMetrics;
  private readonly bus: LightSourceEventBus;

  private state: LightSourceState = LightSourceState.OFF;
  private currentPower = 0;
  private emission?: ActiveEmission;
  private autoStopTimer?: NodeJS.Timeout;
  private interruption?: Interruption;
  private emissionTimeMs = 0;
  private lastCalibrationAt?: number;

  constructor(
    config: LightSourceConfig,
    subsystems: Partial<LightSourceSubsystems> = {},
    options: LightSourceControllerOptions = {}
  ) {
    const validation = validateLightSourceConfig(config);
    if (!validation.valid) {
      throw new ConfigurationError(
        `Invalid light source configuration: ${validation.issues.join('; ')}`,
        validation.issues
      );
    }

    this.config = Object.freeze({ ...config });
    this.jet = subsystems.jet ?? new SimulatedJetSubsystem();
    this.optimizer = subsystems.optimizer ?? new SimulatedOptimizerSubsystem();
    this.monitor = subsystems.monitor ?? new SimulatedMonitor();
    this.logger = (options.logger ?? new Logger()).child({ component: 'LightSourceController' });
    this.metrics = options.metrics ?? new ControllerMetrics();
    this.bus = new LightSourceEventBus(this.logger);

    this.logger.info('Light source controller initialized', {
      wavelength: this.config.wavelength,
      maxPower: this.config.maxPower
    });
  }

  /**
   * Power on, warm up and become ready
   */
  async powerOn(): Promise<boolean> {
    if (this.state !== LightSourceState.OFF) {
      return this.reject('powerOn', [LightSourceState.OFF]);
    }

    return this.runInterruptible(signal => this.executePowerOn(signal));
  }

  private async executePowerOn(signal: AbortSignal): Promise<boolean> {
    this.logger.info('Powering on light source');
    this.transition(LightSourceState.STANDBY);

    try {
      await this.perform('jet', 'initialize', () => this.jet.initialize());
      ensureNotAborted(signal, 'powerOn');
      await this.perform('optimizer', 'warmUp', () => this.optimizer.warmUp());
      await this.executeWarmupSequence(signal);
      ensureNotAborted(signal, 'powerOn');

      this.transition(LightSourceState.READY);
      this.logger.info('Light source ready');
      return true;

    } catch (error) {
      if (signal.aborted) {
        this.logger.warn('Power-on interrupted');
        return false;
      }
      this.fail('powerOn', error);
      return false;
    }
  }

  /**
   * Best-effort shutdown; never throws
   */
  async powerOff(): Promise<void> {
    if (this.state === LightSourceState.OFF) {
      this.logger.debug('Light source already off');
      return;
    }

    this.logger.info('Powering off light source');
    this.cancelAutoStop();
    // Subsystems are shut down only once an interrupted operation has settled
    await this.interrupt();

    await this.stopEmission();
    await this.bestEffort('optimizer', 'shutdown', () => this.optimizer.shutdown());
    await this.bestEffort('jet', 'shutdown', () => this.jet.shutdown());

    if (this.getState() !== LightSourceState.OFF) {
      this.closeEmission();
      this.transition(LightSourceState.OFF);
    }
    this.logger.info('Light source off');
  }

  /**
   * Calibrate all subsystems. Only accepted from READY.
   */
  async calibrate(): Promise<boolean> {
    if (this.state !== LightSourceState.READY) {
      return this.reject('calibrate', [LightSourceState.READY]);
    }

    return this.runInterruptible(signal => this.executeCalibration(signal));
  }

  private async executeCalibration(signal: AbortSignal): Promise<boolean> {
    this.logger.info('Starting calibration');
    this.transition(LightSourceState.CALIBRATING);

    const steps: Array<[SubsystemName, string, () => Promise<boolean>]> = [
      ['jet', 'calibrate', () => this.jet.calibrate()],
      ['optimizer', 'calibrate', () => this.optimizer.calibrate()],
      ['monitor', 'calibrateSensors', () => this.monitor.calibrateSensors()]
    ];

    try {
      const failed: SubsystemName[] = [];
      for (const [subsystem, operation, call] of steps) {
        if (!(await this.confirm(subsystem, operation, call))) {
          failed.push(subsystem);
        }
        ensureNotAborted(signal, 'calibrate');
      }

      if (failed.length > 0) {
        for (const subsystem of failed) {
          this.metrics.recordSubsystemFailure(subsystem, 'calibrate');
        }
        this.fail('calibrate', new SubsystemFailureError(
          `Calibration failed for ${failed.join(', ')}`,
          'calibrate',
          failed
        ));
        return false;
      }

      this.lastCalibrationAt = Date.now();
      this.transition(LightSourceState.READY);
      this.logger.info('Calibration complete');
      return true;

    } catch (error) {
      if (signal.aborted) {
        this.logger.warn('Calibration interrupted');
        return false;
      }
      this.fail('calibrate', error);
      return false;
    }
  }

  /**
   * Validate and apply emission parameters, then start emitting
   */
  async startEmission(params: EmissionParameters): Promise<boolean> {
    if (this.state !== LightSourceState.READY) {
      return this.reject('startEmission', [LightSourceState.READY]);
    }

    try {
      assertEmissionParameters(params, this.config);
    } catch (error) {
      this.logger.warn('Rejected emission parameters', { error: describeError(error) });
      return false;
    }

    const request: EmissionParameters = { ...params };
    let optimizing = false;
    let monitoring = false;

    try {
      await this.perform('jet', 'configureEmission', () => this.jet.configureEmission(request));
      await this.perform('optimizer', 'configureOptimization', () => this.optimizer.configureOptimization(request));
      await this.perform('monitor', 'configureMonitoring', () => this.monitor.configureMonitoring(request));

      await this.perform('optimizer', 'startRealTimeOptimization', () => this.optimizer.startRealTimeOptimization());
      optimizing = true;
      await this.perform('monitor', 'startPowerMonitoring', () => this.monitor.startPowerMonitoring());
      monitoring = true;

      const current = this.getState();
      if (current !== LightSourceState.READY) {
        throw new PreconditionViolationError(
          `Emission start interrupted, state is ${current}`,
          'startEmission',
          current,
          [LightSourceState.READY]
        );
      }
    } catch (error) {
      // Undo whatever had started
      if (monitoring) {
        await this.bestEffort('monitor', 'stopPowerMonitoring', () => this.monitor.stopPowerMonitoring());
      }
      if (optimizing) {
        await this.bestEffort('optimizer', 'stopRealTimeOptimization', () => this.optimizer.stopRealTimeOptimization());
      }
      this.report('startEmission', error);
      return false;
    }

    const emission: ActiveEmission = {
      id: uuidv4(),
      params: request,
      mode: resolveOutputMode(request),
      startedAt: Date.now()
    };
    this.emission = emission;

    this.transition(LightSourceState.EMITTING, request.power);
    this.bus.publish(LightSourceEvent.POWER_UPDATE, request.power);

    this.logger.info('Emission started', {
      power: request.power,
      duration: request.duration > 0 ? request.duration : 'continuous',
      mode: emission.mode
    });

    if (request.duration > 0) {
      this.scheduleAutoStop(emission.id, request.duration);
    }
    return true;
  }

  /**
   * Stop an active emission; no-op otherwise
   */
  async stopEmission(): Promise<void> {
    if (this.state !== LightSourceState.EMITTING) {
      this.logger.debug('No active emission to stop');
      return;
    }

    this.cancelAutoStop();
    this.logger.info('Stopping emission');

    await this.bestEffort('optimizer', 'stopRealTimeOptimization', () => this.optimizer.stopRealTimeOptimization());
    await this.bestEffort('monitor', 'stopPowerMonitoring', () => this.monitor.stopPowerMonitoring());

    // Another stop finished first
    if (this.getState() !== LightSourceState.EMITTING) {
      return;
    }

    this.closeEmission();
    this.transition(LightSourceState.READY);
    this.logger.info('Emission stopped');
  }

  /**
   * Adjust output power during emission
   */
  async setPower(power: number): Promise<boolean> {
    if (this.state !== LightSourceState.EMITTING) {
      return this.reject('setPower', [LightSourceState.EMITTING]);
    }

    const validation = validatePowerLevel(power, this.config.maxPower);
    if (!validation.valid) {
      this.logger.warn('Rejected power level', { error: validation.issues[0].message });
      return false;
    }

    let adjusted: boolean;
    try {
      adjusted = await this.confirm('optimizer', 'adjustPower', () => this.optimizer.adjustPower(power));
    } catch (error) {
      this.report('setPower', error);
      return false;
    }

    if (!adjusted) {
      this.report('setPower', this.subsystemFailure('optimizer', 'adjustPower', `rejected ${power} W`));
      return false;
    }

    if (this.getState() !== LightSourceState.EMITTING) {
      return false;
    }

    this.currentPower = power;
    this.metrics.recordPower(power);
    this.bus.publish(LightSourceEvent.POWER_UPDATE, power);
    this.logger.info('Power adjusted', { power });
    return true;
  }

  /**
   * Read-only status snapshot
   */
  async getStatus(): Promise<LightSourceStatus> {
    const state = this.state;
    const currentPower = this.currentPower;
    const emission = this.emission;
    const now = Date.now();

    const [performanceMetrics, jet, optimizer, monitor] = await Promise.all([
      this.readMetrics(),
      this.readStatus('jet', () => this.jet.getStatus()),
      this.readStatus('optimizer', () => this.optimizer.getStatus()),
      this.readStatus('monitor', () => this.monitor.getStatus())
    ]);

    return {
      state,
      currentPower,
      operatingTime: (this.emissionTimeMs + (emission ? now - emission.startedAt : 0)) / 1000,
      wavelength: this.config.wavelength,
      outputMode: emission?.mode,
      performanceMetrics,
      subsystemStatus: { jet, optimizer, monitor },
      lastCalibrationAt: this.lastCalibrationAt,
      calibrationDue: this.isCalibrationDue(state, now)
    };
  }

  registerCallback<E extends LightSourceEvent>(event: E, listener: EventListener<E>): void {
    this.bus.register(event, listener);
  }

  /**
   * Report the reason, then shut down immediately
   */
  async emergencyStop(reason: string): Promise<void> {
    const stop = new EmergencyStopError(reason);
    this.logger.warn(stop.message);
    this.bus.publish(LightSourceEvent.ERROR, stop.toEventPayload());
    await this.powerOff();
  }

  getState(): LightSourceState {
    return this.state;
  }

  getCurrentPower(): number {
    return this.currentPower;
  }

  getConfig(): Readonly<LightSourceConfig> {
    return this.config;
  }

  getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  private transition(next: LightSourceState, power: number = 0): void {
    const previous = this.state;
    if (!canTransition(previous, next)) {
      throw new PreconditionViolationError(
        `Illegal transition ${previous} -> ${next}`,
        'transition',
        previous,
        [...ALLOWED_TRANSITIONS[previous]]
      );
    }

    this.state = next;
    this.currentPower = next === LightSourceState.EMITTING ? power : 0;
    this.metrics.recordTransition(previous, next);
    this.metrics.recordPower(this.currentPower);
    this.logger.debug('State transition', { from: previous, to: next });

    this.bus.publish(LightSourceEvent.STATE_CHANGE, {
      oldState: previous,
      newState: next,
      timestamp: Date.now()
    });
  }

  private async executeWarmupSequence(signal: AbortSignal): Promise<void> {
    const scale = this.config.warmupTime / NOMINAL_WARMUP_SECONDS;

    for (const step of WARMUP_RAMP) {
      ensureNotAborted(signal, 'warmup');
      const targetPower = this.config.maxPower * step.powerRatio;
      this.logger.debug('Warmup step', { targetPower, holdSeconds: step.holdSeconds * scale });

      await this.perform('optimizer', 'prepareForPower', () => this.optimizer.prepareForPower(targetPower));
      await delay(step.holdSeconds * scale * 1000, signal, 'warmup');
    }
  }

  private scheduleAutoStop(emissionId: string, durationSeconds: number): void {
    this.cancelAutoStop();
    this.autoStopTimer = setTimeout(() => {
      this.autoStopTimer = undefined;
      // Stale timer for an emission that already ended
      if (this.state !== LightSourceState.EMITTING || this.emission?.id !== emissionId) {
        return;
      }
      this.logger.info('Emission duration elapsed', { emissionId });
      this.stopEmission().catch((error: unknown) => this.report('stopEmission', error));
    }, durationSeconds * 1000);
  }

  private cancelAutoStop(): void {
    if (this.autoStopTimer) {
      clearTimeout(this.autoStopTimer);
      this.autoStopTimer = undefined;
    }
  }

  private closeEmission(): void {
    if (this.emission) {
      this.emissionTimeMs += Date.now() - this.emission.startedAt;
      this.emission = undefined;
    }
  }

  private async runInterruptible(operation: (signal: AbortSignal) => Promise<boolean>): Promise<boolean> {
    const interruption: Interruption = { controller: new AbortController() };
    this.interruption = interruption;
    try {
      interruption.task = operation(interruption.controller.signal);
      return await interruption.task;
    } finally {
      if (this.interruption === interruption) {
        this.interruption = undefined;
      }
    }
  }

  // Operations under runInterruptible resolve false once aborted; they never reject
  private async interrupt(): Promise<void> {
    const running = this.interruption;
    if (!running) {
      return;
    }
    this.interruption = undefined;
    running.controller.abort();
    await running.task;
  }

  private async perform(
    subsystem: SubsystemName,
    operation: string,
    call: () => Promise<void>
  ): Promise<void> {
    try {
      await call();
    } catch (error) {
      throw this.subsystemFailure(subsystem, operation, error);
    }
  }

  private async confirm(
    subsystem: SubsystemName,
    operation: string,
    call: () => Promise<boolean>
  ): Promise<boolean> {
    try {
      return await call();
    } catch (error) {
      throw this.subsystemFailure(subsystem, operation, error);
    }
  }

  private async bestEffort(
    subsystem: SubsystemName,
    operation: string,
    call: () => Promise<void>
  ): Promise<void> {
    try {
      await this.perform(subsystem, operation, call);
    } catch (error) {
      this.report(operation, error);
    }
  }

  private subsystemFailure(
    subsystem: SubsystemName,
    operation: string,
    cause: unknown
  ): SubsystemFailureError {
    this.metrics.recordSubsystemFailure(subsystem, operation);
    return new SubsystemFailureError(
      `${subsystem}.${operation} failed: ${describeError(cause)}`,
      operation,
      [subsystem],
      cause
    );
  }

  private report(operation: string, error: unknown): void {
    const failure = error instanceof LightSourceError
      ? error
      : new SubsystemFailureError(describeError(error), operation, [], error);

    this.logger.error(`${operation} failed`, { error: failure.message, ...failure.context });
    this.bus.publish(LightSourceEvent.ERROR, failure.toEventPayload());
  }

  private fail(operation: string, error: unknown): void {
    if (canTransition(this.state, LightSourceState.ERROR)) {
      this.transition(LightSourceState.ERROR);
    }
    this.report(operation, error);
  }

  private reject(operation: string, expected: LightSourceState[]): false {
    const violation = new PreconditionViolationError(
      `${operation} requires state ${expected.join(' or ')}, current state is ${this.state}`,
      operation,
      this.state,
      expected
    );
    this.logger.warn(violation.message, violation.context);
    return false;
  }

  private async readStatus(
    subsystem: SubsystemName,
    call: () => Promise<SubsystemStatus>
  ): Promise<SubsystemStatus> {
    try {
      return await call();
    } catch (error) {
      this.logger.warn('Subsystem status unavailable', { subsystem, error: describeError(error) });
      return { status: 'unavailable', details: { error: describeError(error) } };
    }
  }

  private async readMetrics(): Promise<PerformanceMetrics> {
    try {
      return { ...(await this.monitor.getCurrentMetrics()) };
    } catch (error) {
      this.logger.warn('Performance metrics unavailable', { error: describeError(error) });
      return {};
    }
  }

  private isCalibrationDue(state: LightSourceState, now: number): boolean {
    if (this.config.calibrationInterval <= 0) {
      return false;
    }
    if (state !== LightSourceState.READY && state !== LightSourceState.EMITTING) {
      return false;
    }
    return this.lastCalibrationAt === undefined ||
      now - this.lastCalibrationAt >= this.config.calibrationInterval * 1000;
  }
}
