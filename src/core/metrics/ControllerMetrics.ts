import { Counter, Gauge, Registry } from 'prom-client';
import { LightSourceState } from '../types/LightSourceState';

export class ControllerMetrics {
  readonly registry: Registry;
  readonly power: Gauge<string>;
  readonly state: Gauge<'state'>;
  readonly transitions: Counter<'from' | 'to'>;
  readonly subsystemFailures: Counter<'subsystem' | 'operation'>;

  // Each controller owns its registry so several can coexist in one process
  constructor(prefix: string = 'light_source', registry: Registry = new Registry()) {
    this.registry = registry;

    this.power = new Gauge({
      name: `${prefix}_power_watts`,
      help: 'Current output power in watts',
      registers: [registry]
    });

    this.state = new Gauge<'state'>({
      name: `${prefix}_state`,
      help: 'Current controller state (1 for the active state)',
      labelNames: ['state'],
      registers: [registry]
    });

    this.transitions = new Counter<'from' | 'to'>({
      name: `${prefix}_transitions_total`,
      help: 'Committed state transitions',
      labelNames: ['from', 'to'],
      registers: [registry]
    });

    this.subsystemFailures = new Counter<'subsystem' | 'operation'>({
      name: `${prefix}_subsystem_failures_total`,
      help: 'Failed collaborator calls',
      labelNames: ['subsystem', 'operation'],
      registers: [registry]
    });

    this.recordState(LightSourceState.OFF);
    this.power.set(0);
  }

  recordTransition(from: LightSourceState, to: LightSourceState): void {
    this.transitions.inc({ from, to });
    this.recordState(to);
  }

  recordPower(power: number): void {
    this.power.set(power);
  }

  recordSubsystemFailure(subsystem: string, operation: string): void {
    this.subsystemFailures.inc({ subsystem, operation });
  }

  getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private recordState(current: LightSourceState): void {
    for (const state of Object.values(LightSourceState)) {
      this.state.set({ state }, state === current ? 1 : 0);
    }
  }
}
