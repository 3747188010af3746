export interface PresenceValue {
  lat?: number;
  lng?: number;
  accuracy?: number;
  capturedAtEpochMs?: number;
  provider?: string;
  sharingEnabled: boolean;
  lastHeartbeatEpochMs: number;
  trackingDegraded: boolean;
  revision: number;
}

export interface PresenceEntryRecord {
  key: string;
  value: PresenceValue;
  revision: number;
  updatedAt: number;
  createdAt: number;
}

export interface PutPresenceInput {
  key: string;
  value: PresenceValue;
  revision: number;
}

export type PutPresenceOutcome =
  | { kind: 'applied'; record: PresenceEntryRecord }
  | { kind: 'stale' };

export type PresenceErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'STALE_WRITE' | 'INTERNAL_ERROR';

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface PresenceErrorBody {
  requestId: string;
  error: {
    code: PresenceErrorCode;
    message: string;
    details?: ValidationIssue[];
  };
}

export interface PresenceRepository {
  getEntry: (key: string) => Promise<PresenceEntryRecord | null>;
  listEntries: (prefix: string) => Promise<PresenceEntryRecord[]>;
  putEntry: (input: PutPresenceInput) => Promise<PutPresenceOutcome>;
  removeEntry: (key: string) => Promise<{ removed: boolean }>;
}

export interface PresenceChange {
  key: string;
  /** `null` when the entry was removed. */
  value: PresenceValue | null;
}
