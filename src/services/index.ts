export { loadTrackingConfig } from '../config/env';
export type { TrackingConfig } from '../config/env';
export { createLogger, setDebugLogging } from './logger';
export type { Logger } from './logger';
export type { Clock, ServiceHealth, ServiceState } from './types';

export { createLocationSample, toGeoPoint } from './location/locationSample';
export type { AccuracyClass, GeoPoint, LocationSample, SourceProvider } from './location/locationSample';
export type { LocationSampler, WatchPositionOptions } from './location/locationSampler';
export type { PositionProvider, RawFix } from './location/positionProvider';
export { ProviderChainSampler, STATIONARY_REFRESH_CYCLES } from './location/providerChainSampler';
export { ReplayPositionProvider, parseTrack } from './location/replayPositionProvider';
export type { TrackPoint } from './location/replayPositionProvider';

export { resolvePolicyTier, resolveSamplingPolicy } from './power/batteryAdaptationPolicy';
export type { NetworkClass, PolicyTier, PowerState, SamplingPolicy } from './power/batteryAdaptationPolicy';
export { DEVICE_CLASS_PROFILES, resolveDeviceClass } from './power/deviceClasses';
export type { DeviceClass, ExemptionKind, PowerExemptionRequester } from './power/deviceClasses';
export { PowerStateMonitor } from './power/powerStateMonitor';

export type { LocationConsent, LocationConsentGate } from './tracking/locationConsent';
export { StrategySelector } from './tracking/strategySelector';
export type { StartResult, TrackingSession, TrackingState } from './tracking/strategySelector';
export {
  AllStrategiesExhaustedError,
  PermissionDeniedError,
  ProviderUnavailableError,
  PublishFailureError,
  SampleTimeoutError,
  TrackingError,
  isTrackingError,
} from './tracking/trackingErrors';
export type { TrackingErrorCode } from './tracking/trackingErrors';
export { SamplerStrategy, createDefaultStrategies } from './tracking/trackingStrategy';
export type { StrategyContext, TrackingStrategy } from './tracking/trackingStrategy';

export { describeLastSeen } from './presence/peerPresence';
export type { PeerPresenceView } from './presence/peerPresence';
export { PresenceSyncEngine } from './presence/presenceSyncEngine';
export type { PeerDirectory, PeerPresenceUpdate, PublishOutcome } from './presence/presenceSyncEngine';
export type { PublishedPresence } from './presence/presenceRecord';

export { ProximityEngine } from './proximity/proximityEngine';
export type { GeofenceEvent, ProximityEvent } from './proximity/proximityEngine';
export type { GeofenceRegion } from './proximity/geofenceRegion';

export { InMemoryLocationStore } from './store/inMemoryLocationStore';
export type { SharedLocationStore, StoreChange, StoreValue } from './store/sharedLocationStore';
export { SocketLocationStore } from './store/socketLocationStore';
export { createSocketTransport } from './store/socketTransport';
export type { PresenceTransport } from './store/socketTransport';

export { loggingNotificationSurface } from './notifications/notificationSurface';
export type { NotificationSurface } from './notifications/notificationSurface';
export { LocationSharingRuntime } from './runtime/locationSharingRuntime';
export { createLocationSharingRuntime } from './runtime/createLocationSharingRuntime';
export type { LocationSharingComponents } from './runtime/createLocationSharingRuntime';

export { distanceMeters, formatDistance } from '../utils/geo';
