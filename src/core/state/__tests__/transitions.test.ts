import { ALLOWED_TRANSITIONS, canTransition } from '../transitions';
import { LightSourceState } from '../../types/LightSourceState';

const { OFF, STANDBY, CALIBRATING, READY, EMITTING, ERROR } = LightSourceState;

describe('State transitions', () => {
  test('should only leave off through standby', () => {
    expect(ALLOWED_TRANSITIONS[OFF]).toEqual([STANDBY]);
    expect(canTransition(OFF, READY)).toBe(false);
    expect(canTransition(OFF, EMITTING)).toBe(false);
  });

  test('should only leave error through off', () => {
    expect(ALLOWED_TRANSITIONS[ERROR]).toEqual([OFF]);
    expect(canTransition(ERROR, READY)).toBe(false);
    expect(canTransition(ERROR, STANDBY)).toBe(false);
  });

  test('should only start emitting from ready', () => {
    const sources = Object.values(LightSourceState).filter(state => canTransition(state, EMITTING));

    expect(sources).toEqual([READY]);
  });

  test('should allow powering off from every powered state', () => {
    for (const state of [STANDBY, CALIBRATING, READY, EMITTING, ERROR]) {
      expect(canTransition(state, OFF)).toBe(true);
    }
  });

  test('should not allow self transitions', () => {
    for (const state of Object.values(LightSourceState)) {
      expect(canTransition(state, state)).toBe(false);
    }
  });
});
