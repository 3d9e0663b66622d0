import { ControllerMetrics } from '../ControllerMetrics';
import { LightSourceState } from '../../types/LightSourceState';

describe('ControllerMetrics', () => {
  let metrics: ControllerMetrics;

  beforeEach(() => {
    metrics = new ControllerMetrics();
  });

  test('should start off with zero power', async () => {
    const state = await metrics.state.get();
    const active = state.values.filter(value => value.value === 1);

    expect(active.map(value => value.labels.state)).toEqual(['off']);
    expect((await metrics.power.get()).values[0].value).toBe(0);
  });

  test('should count transitions and track the active state', async () => {
    metrics.recordTransition(LightSourceState.OFF, LightSourceState.STANDBY);
    metrics.recordTransition(LightSourceState.STANDBY, LightSourceState.READY);

    const transitions = await metrics.transitions.get();
    expect(transitions.values.map(({ labels, value }) => [labels.from, labels.to, value])).toEqual([
      ['off', 'standby', 1],
      ['standby', 'ready', 1]
    ]);

    const state = await metrics.state.get();
    expect(state.values.find(value => value.labels.state === 'ready')?.value).toBe(1);
    expect(state.values.find(value => value.labels.state === 'off')?.value).toBe(0);
  });

  test('should record power and subsystem failures', async () => {
    metrics.recordPower(2.5e-9);
    metrics.recordSubsystemFailure('jet', 'initialize');
    metrics.recordSubsystemFailure('jet', 'initialize');

    expect((await metrics.power.get()).values[0].value).toBe(2.5e-9);
    expect((await metrics.subsystemFailures.get()).values[0]).toMatchObject({
      value: 2,
      labels: { subsystem: 'jet', operation: 'initialize' }
    });
  });

  test('should render in exposition format', async () => {
    const output = await metrics.getMetrics();

    expect(output).toContain('# HELP light_source_power_watts Current output power in watts');
    expect(output).toContain('# TYPE light_source_power_watts gauge');
    expect(output).toContain('light_source_state{state="off"} 1');
  });

  test('should allow several instances side by side', () => {
    expect(() => new ControllerMetrics()).not.toThrow();
    expect(() => new ControllerMetrics('bench_source')).not.toThrow();
  });
});
