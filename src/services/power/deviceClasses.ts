export type DeviceClass = 'standard' | 'moderate' | 'aggressive';

export type ExemptionKind = 'battery-optimization' | 'auto-start' | 'background-activity';

export type DeviceClassProfile = {
  intervalMultiplier: number;
  exemptions: ExemptionKind[];
};

export const DEVICE_CLASS_PROFILES: Record<DeviceClass, DeviceClassProfile> = {
  standard: { intervalMultiplier: 1, exemptions: ['battery-optimization'] },
  moderate: { intervalMultiplier: 1, exemptions: ['battery-optimization', 'background-activity'] },
  aggressive: {
    intervalMultiplier: 1.5,
    exemptions: ['battery-optimization', 'auto-start', 'background-activity'],
  },
};

// Vendors whose power managers evict background location services.
const MANUFACTURER_CLASSES: Record<string, DeviceClass> = {
  xiaomi: 'aggressive',
  redmi: 'aggressive',
  poco: 'aggressive',
  huawei: 'aggressive',
  honor: 'aggressive',
  oppo: 'aggressive',
  realme: 'aggressive',
  vivo: 'aggressive',
  oneplus: 'aggressive',
  meizu: 'aggressive',
  samsung: 'moderate',
  asus: 'moderate',
  sony: 'moderate',
  lenovo: 'moderate',
};

export function resolveDeviceClass(manufacturer: string | null | undefined): DeviceClass {
  const normalized = manufacturer?.trim().toLowerCase();
  if (!normalized) {
    return 'standard';
  }

  for (const [vendor, deviceClass] of Object.entries(MANUFACTURER_CLASSES)) {
    if (normalized.includes(vendor)) {
      return deviceClass;
    }
  }
  return 'standard';
}

/** Best-effort platform call asking the OS to stop evicting the tracking process. */
export interface PowerExemptionRequester {
  requestExemption(kind: ExemptionKind): Promise<boolean>;
}
