import { DEFAULT_POWER_STATE, type PowerState } from './batteryAdaptationPolicy';

type PowerStateEventMap = {
  POWER_STATE_CHANGED: { type: 'POWER_STATE_CHANGED'; state: PowerState; previous: PowerState };
};

type PowerStateListener<TEvent extends keyof PowerStateEventMap> = (
  payload: PowerStateEventMap[TEvent]
) => void;

function isSameState(a: PowerState, b: PowerState): boolean {
  return (
    a.batteryLevel === b.batteryLevel &&
    a.isCharging === b.isCharging &&
    a.isPowerSaveMode === b.isPowerSaveMode &&
    a.networkClass === b.networkClass
  );
}

/** Holds the latest power/network readings reported by the platform adapter. */
export class PowerStateMonitor {
  private state: PowerState;
  private listeners: {
    [K in keyof PowerStateEventMap]: Set<PowerStateListener<K>>;
  } = {
    POWER_STATE_CHANGED: new Set(),
  };

  constructor(initial: PowerState = DEFAULT_POWER_STATE) {
    this.state = { ...initial };
  }

  getState(): PowerState {
    return { ...this.state };
  }

  update(patch: Partial<PowerState>): PowerState {
    const previous = this.state;
    const next: PowerState = { ...previous, ...patch };
    if (isSameState(previous, next)) {
      return this.getState();
    }

    this.state = next;
    this.emit('POWER_STATE_CHANGED', {
      type: 'POWER_STATE_CHANGED',
      state: this.getState(),
      previous: { ...previous },
    });
    return this.getState();
  }

  on<TEvent extends keyof PowerStateEventMap>(
    event: TEvent,
    listener: PowerStateListener<TEvent>
  ): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  private emit<TEvent extends keyof PowerStateEventMap>(
    event: TEvent,
    payload: PowerStateEventMap[TEvent]
  ): void {
    for (const listener of this.listeners[event]) {
      listener(payload);
    }
  }
}
