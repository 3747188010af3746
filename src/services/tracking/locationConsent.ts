export type LocationConsent = 'granted' | 'foreground_only' | 'denied';

/**
 * Consent is collected by the permission surface before tracking starts; the
 * core only reads the outcome.
 */
export interface LocationConsentGate {
  getLocationConsent(): Promise<LocationConsent>;
}

export const grantedConsentGate: LocationConsentGate = {
  getLocationConsent: async () => 'granted',
};
