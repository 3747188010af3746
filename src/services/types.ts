export type ServiceState = 'idle' | 'active' | 'degraded' | 'error';

export interface ServiceHealth {
  name: string;
  state: ServiceState;
  detail: string;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
