import { createLogger } from '../logger';
import type { GeofenceEvent, ProximityEvent } from '../proximity/proximityEngine';
import type { AllStrategiesExhaustedError } from '../tracking/trackingErrors';

/** Where user-facing alerts go. Rendering and push delivery live outside the core. */
export interface NotificationSurface {
  notifyProximity(event: ProximityEvent): void;
  notifyGeofence(kind: 'entered' | 'exited', event: GeofenceEvent): void;
  notifyTrackingDegraded(error: AllStrategiesExhaustedError, retryAt: number): void;
  notifyTrackingRestored(strategyId: string): void;
}

const log = createLogger('notify');

export const loggingNotificationSurface: NotificationSurface = {
  notifyProximity(event) {
    log.info('peer nearby', { peerId: event.peerId, distanceMeters: Math.round(event.distanceMeters) });
  },
  notifyGeofence(kind, event) {
    log.info(`peer ${kind} region`, { regionId: event.regionId, label: event.label, peerId: event.peerId });
  },
  notifyTrackingDegraded(error, retryAt) {
    log.warn('location tracking degraded', {
      failures: error.failures.map((failure) => `${failure.strategyId}:${failure.code}`),
      retryAt: new Date(retryAt).toISOString(),
    });
  },
  notifyTrackingRestored(strategyId) {
    log.info('location tracking restored', { strategyId });
  },
};
