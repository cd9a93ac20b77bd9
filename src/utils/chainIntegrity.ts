import type { KeyObject } from 'crypto';
import type { AuditRecord } from '../core/types.js';
import { computeRecordHash } from './hashChain.js';
import { verifyHashSignature } from './signing.js';

export interface ChainBreak {
  index: number; // index within provided records array (oldest -> newest expected)
  traceId: string;
  reason: 'PREV_MISMATCH' | 'HASH_MISMATCH' | 'SIGNATURE_INVALID' | 'TIP_MISMATCH';
  expected?: string | null;
  actual?: string | null;
}

export interface ChainVerificationResult {
  valid: boolean;
  breaks: ChainBreak[];
  lastHash: string | null; // last valid hash in the verified portion
  anchor: string | null; // prevHash the verified portion starts from
}

export interface ChainVerificationOptions {
  /**
   * Expected prevHash of the first record. `null` demands a genesis record;
   * 'any' accepts whatever the first record links to (older records purged).
   */
  anchor?: string | null | 'any';
}

/** Recomputes the record hash and checks the signature over it. */
export function verifyRecord(record: AuditRecord, publicKey: KeyObject): boolean {
  if (computeRecordHash(record) !== record.recordHash) return false;
  return verifyHashSignature(record.recordHash, record.signature, publicKey);
}

/**
 * Verifies integrity of an audit record hash chain.
 * Input should be ordered oldest -> newest (see orderRecordsByChain).
 */
export function verifyRecordChain(
  records: AuditRecord[],
  publicKey?: KeyObject,
  opts: ChainVerificationOptions = {},
): ChainVerificationResult {
  const breaks: ChainBreak[] = [];
  const anchorOpt = opts.anchor === undefined ? null : opts.anchor;
  const anchor = anchorOpt === 'any' ? (records[0]?.prevHash ?? null) : anchorOpt;
  let prevHash: string | null = anchor;
  let lastValid: string | null = null;

  for (let i = 0; i < records.length; i++) {
    const r = records[i];
    if (r.prevHash !== prevHash) {
      breaks.push({
        index: i,
        traceId: r.traceId,
        reason: 'PREV_MISMATCH',
        expected: prevHash,
        actual: r.prevHash,
      });
      // Once broken, we can't reliably continue; exit early
      return { valid: false, breaks, lastHash: lastValid, anchor };
    }
    const expectedHash = computeRecordHash(r);
    if (expectedHash !== r.recordHash) {
      breaks.push({
        index: i,
        traceId: r.traceId,
        reason: 'HASH_MISMATCH',
        expected: expectedHash,
        actual: r.recordHash,
      });
      return { valid: false, breaks, lastHash: lastValid, anchor };
    }
    if (publicKey && !verifyHashSignature(r.recordHash, r.signature, publicKey)) {
      breaks.push({ index: i, traceId: r.traceId, reason: 'SIGNATURE_INVALID' });
      return { valid: false, breaks, lastHash: lastValid, anchor };
    }
    prevHash = r.recordHash;
    lastValid = r.recordHash;
  }

  return { valid: true, breaks, lastHash: lastValid, anchor };
}

// Attempt to order records following the hash chain starting at the single record whose
// prevHash is not produced by any other record. Falls back to input order if inconsistent.
export function orderRecordsByChain<T extends Pick<AuditRecord, 'prevHash' | 'recordHash'>>(
  records: T[],
): T[] {
  if (records.length <= 1) return records.slice();
  const byPrev = new Map<string | null, T[]>();
  const hashes = new Set<string>();
  for (const r of records) {
    const arr = byPrev.get(r.prevHash) || [];
    arr.push(r);
    byPrev.set(r.prevHash, arr);
    hashes.add(r.recordHash);
  }
  const heads = records.filter((r) => r.prevHash === null || !hashes.has(r.prevHash));
  if (heads.length !== 1) return records.slice(); // ambiguous
  const ordered: T[] = [];
  let current = heads[0];
  ordered.push(current);
  for (;;) {
    const nextCandidates = byPrev.get(current.recordHash) || [];
    if (nextCandidates.length === 0) break;
    if (nextCandidates.length > 1) return records.slice(); // branch -> ambiguous
    current = nextCandidates[0];
    ordered.push(current);
    if (ordered.length > records.length) return records.slice(); // cycle guard
  }
  if (ordered.length !== records.length) return records.slice(); // disconnected segments
  return ordered;
}
