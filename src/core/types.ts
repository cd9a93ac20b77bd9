// Domain model shared across modules; persisted shapes live in ./schemas.ts

import type { DegradationReason } from './errors.js';
import type { Finding } from './schemas.js';

export type { AuditRecord, Finding, NlpAnalysis, PiiDetection, UnsignedRecord } from './schemas.js';

export interface TraceId {
  readonly uniqueId: string;
  readonly createdAt: Date;
}

export type DetectorKind = 'local_pattern' | 'remote_classifier';

export interface RedactionResult {
  maskedText: string;
  findings: Finding[];
  detectorUsed: DetectorKind;
  totalMasked: number;
  score: number;
  limitations: string[];
  degradedReason?: DegradationReason;
}

export type RecordArea = 'pending' | 'processed';

export interface RecordHandle {
  name: string;
  path: string;
  area: RecordArea;
  createdAtMs: number;
}

export interface SinkCoordinates {
  logGroup: string;
  logStream: string;
}

export interface LogEvent {
  timestampMs: number;
  message: string;
}

/** In-memory bookkeeping for one retry sequence; never persisted. */
export interface DeliveryAttempt {
  recordRef: string;
  attemptNumber: number;
  backoffDeadline: number | null;
}
