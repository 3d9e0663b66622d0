import { LightSourceState } from '../types/LightSourceState';
import {
  ErrorEventPayload,
  ListenerFailureError,
  describeError
} from '../errors/LightSourceError';
import { Logger } from '../logging/Logger';

export enum LightSourceEvent {
  STATE_CHANGE = 'state_change',
  POWER_UPDATE = 'power_update',
  ERROR = 'error'
}

export interface StateChangePayload {
  oldState: LightSourceState;
  newState: LightSourceState;
  timestamp: number;
}

export interface LightSourceEventMap {
  [LightSourceEvent.STATE_CHANGE]: StateChangePayload;
  [LightSourceEvent.POWER_UPDATE]: number;
  [LightSourceEvent.ERROR]: ErrorEventPayload;
}

export type EventListener<E extends LightSourceEvent> = (payload: LightSourceEventMap[E]) => void;

const EVENT_NAMES = new Set<string>(Object.values(LightSourceEvent));

export function isLightSourceEvent(name: string): name is LightSourceEvent {
  return EVENT_NAMES.has(name);
}

class ListenerChannel<T> {
  private readonly listeners: Array<(payload: T) => void> = [];

  add(listener: (payload: T) => void): void {
    this.listeners.push(listener);
  }

  get size(): number {
    return this.listeners.length;
  }

  dispatch(payload: T, onFailure: (error: unknown) => void): void {
    // Listeners added during dispatch wait for the next publish
    for (const listener of [...this.listeners]) {
      try {
        listener(payload);
      } catch (error) {
        onFailure(error);
      }
    }
  }
}

type ChannelMap = {
  [K in keyof LightSourceEventMap]: ListenerChannel<LightSourceEventMap[K]>;
};

/**
 * Ordered, synchronous listener registry for controller events.
 * Listener failures never reach the publisher; they are logged and
 * republished as `error` events.
 */
export class LightSourceEventBus {
  private readonly channels: ChannelMap = {
    [LightSourceEvent.STATE_CHANGE]: new ListenerChannel<StateChangePayload>(),
    [LightSourceEvent.POWER_UPDATE]: new ListenerChannel<number>(),
    [LightSourceEvent.ERROR]: new ListenerChannel<ErrorEventPayload>()
  };

  constructor(private readonly logger: Logger) {}

  register<E extends LightSourceEvent>(event: E, listener: EventListener<E>): void {
    if (!isLightSourceEvent(event)) {
      this.logger.debug('Ignoring listener for unknown event', { event });
      return;
    }
    this.channels[event].add(listener);
  }

  publish<E extends LightSourceEvent>(event: E, payload: LightSourceEventMap[E]): void {
    this.channels[event].dispatch(payload, error => this.handleListenerFailure(event, error));
  }

  listenerCount(event: LightSourceEvent): number {
    return isLightSourceEvent(event) ? this.channels[event].size : 0;
  }

  private handleListenerFailure(event: LightSourceEvent, error: unknown): void {
    this.logger.error('Event listener failed', { event, error: describeError(error) });

    if (event === LightSourceEvent.ERROR) {
      return;
    }

    this.publish(LightSourceEvent.ERROR, new ListenerFailureError(event, error).toEventPayload());
  }
}
