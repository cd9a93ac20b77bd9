import crypto from 'crypto';
import { buildCanonicalPayload } from './signing.js';
import type { AuditRecord, UnsignedRecord } from '../core/types.js';

export function sha256Hex(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/** sha256(canonical ‖ prev); the genesis record links to the empty string. */
export function computeHashChain(prev: string | null | undefined, canonicalJson: string): string {
  const prevPart = prev || '';
  return sha256Hex(canonicalJson + prevPart);
}

export function unsignedPart(record: AuditRecord | UnsignedRecord): UnsignedRecord {
  return {
    traceId: record.traceId,
    timestamp: record.timestamp,
    request: record.request,
    response: record.response,
    prevHash: record.prevHash,
  };
}

export function computeRecordHash(record: AuditRecord | UnsignedRecord): string {
  return computeHashChain(record.prevHash, buildCanonicalPayload(unsignedPart(record)));
}
