import type { KeyObject } from 'crypto';
import type { AuditRecord } from '../core/types.js';
import { integrityVerificationsTotal } from '../metrics/index.js';
import type { ChainState } from '../repositories/chainStateRepository.js';
import type { RecordRepository } from '../repositories/recordRepository.js';
import { orderRecordsByChain, verifyRecordChain, type ChainVerificationResult } from '../utils/chainIntegrity.js';
import { getLogger } from '../utils/logging.js';

export interface StoredChainReport extends ChainVerificationResult {
  count: number;
  lastTraceId: string | null;
  unreadable: string[];
}

export interface StoredChainOptions {
  /** Committed chain state; the newest stored record must be its tip (or the in-flight record). */
  state?: ChainState;
}

/**
 * Verifies everything still on disk (processed, then pending) as one chain.
 * Retention removes the oldest records, so the first surviving record may link
 * to a hash that is no longer present.
 */
export async function verifyStoredChain(
  records: RecordRepository,
  publicKey: KeyObject,
  opts: StoredChainOptions = {},
): Promise<StoredChainReport> {
  const loaded: AuditRecord[] = [];
  const unreadable: string[] = [];
  for (const handle of [...(await records.listProcessed()), ...(await records.listPending())]) {
    try {
      loaded.push(await records.read(handle));
    } catch {
      unreadable.push(handle.name);
    }
  }
  const ordered = orderRecordsByChain(loaded);
  const result = verifyRecordChain(ordered, publicKey, { anchor: 'any' });
  if (result.valid && opts.state) checkTip(result, ordered, opts.state);
  const valid = result.valid && unreadable.length === 0;
  integrityVerificationsTotal.inc({ result: valid ? 'valid' : 'invalid' });
  const lastIndex = valid ? ordered.length - 1 : (result.breaks[0]?.index ?? ordered.length) - 1;
  const report: StoredChainReport = {
    ...result,
    valid,
    count: ordered.length,
    lastTraceId: lastIndex >= 0 ? ordered[lastIndex].traceId : null,
    unreadable,
  };
  getLogger().info(
    { valid, count: report.count, breaks: report.breaks.length, unreadable: unreadable.length },
    'chain-verified',
  );
  return report;
}

// Records purged by retention leave nothing to compare; only a non-empty store is checked
function checkTip(result: ChainVerificationResult, ordered: AuditRecord[], state: ChainState): void {
  const newest = ordered[ordered.length - 1];
  if (!newest) return;
  if (newest.recordHash === state.lastHash || newest.recordHash === state.inFlight?.recordHash) return;
  result.valid = false;
  result.breaks.push({
    index: ordered.length - 1,
    traceId: newest.traceId,
    reason: 'TIP_MISMATCH',
    expected: state.lastHash,
    actual: newest.recordHash,
  });
}
