import { LightSourceState } from '../types/LightSourceState';

const { OFF, STANDBY, CALIBRATING, READY, EMITTING, ERROR } = LightSourceState;

/**
 * Every edge the controller may commit. Power-off is reachable from every
 * powered state; error is left only through power-off.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<LightSourceState, readonly LightSourceState[]>> = {
  [OFF]: [STANDBY],
  [STANDBY]: [READY, ERROR, OFF],
  [CALIBRATING]: [READY, ERROR, OFF],
  [READY]: [CALIBRATING, EMITTING, OFF],
  [EMITTING]: [READY, OFF],
  [ERROR]: [OFF]
};

export function canTransition(from: LightSourceState, to: LightSourceState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}
