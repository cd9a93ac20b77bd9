import { AuthError, TransportError, errorName } from '../core/errors.js';
import type { AuditRecord, DeliveryAttempt, RecordHandle, SinkCoordinates } from '../core/types.js';
import { deliveriesTotal, deliveryBackoffMs, deliveryRetriesTotal } from '../metrics/index.js';
import type { AcknowledgementLedger } from '../repositories/ackLedger.js';
import { recordFileName, type PurgeResult, type RecordRepository } from '../repositories/recordRepository.js';
import { getLogger } from '../utils/logging.js';
import { sleep as realSleep, withTimeout } from '../utils/timeout.js';
import { utf8Length } from '../utils/utf8.js';
import {
  INITIAL_STATE,
  transition,
  type DeliveryState,
  type RetryPolicy,
} from './deliveryStateMachine.js';
import { MAX_EVENT_BYTES, type LogSink } from './logSink.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DeliveryOptions extends RetryPolicy {
  coords: SinkCoordinates;
  pacingMs: number;
  retentionDays: number;
  sinkTimeoutMs: number;
}

export interface DeliveryDeps {
  sink: LogSink;
  records: RecordRepository;
  ledger: AcknowledgementLedger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type DeliveryOutcome =
  | { status: 'succeeded'; attempts: number }
  | { status: 'failed'; attempts: number; error: unknown };

export interface DeliveryFailure {
  name: string;
  traceId?: string;
  reason: string;
}

export interface DeliveryReport {
  succeeded: number;
  failed: number;
  skipped: number;
  acknowledged: number;
  previewed: number;
  failures: DeliveryFailure[];
  purge: PurgeResult;
  aborted: boolean;
}

/**
 * Ships pending records to the log sink oldest first. Throttling is retried
 * with exponential backoff; every other failure ends that record's attempt.
 */
export class DeliveryEngine {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly deps: DeliveryDeps,
    private readonly opts: DeliveryOptions,
  ) {
    this.sleep = deps.sleep ?? realSleep;
    this.now = deps.now ?? Date.now;
  }

  async deliverOne(record: AuditRecord, coords: SinkCoordinates = this.opts.coords): Promise<DeliveryOutcome> {
    const log = getLogger();
    const message = JSON.stringify(record);
    if (utf8Length(message) > MAX_EVENT_BYTES) {
      const error = new TransportError(
        `Record ${record.traceId} is ${utf8Length(message)} bytes, above the ${MAX_EVENT_BYTES} byte event limit`,
      );
      log.error({ traceId: record.traceId, bytes: utf8Length(message) }, 'delivery-oversized');
      return { status: 'failed', attempts: 0, error };
    }

    let state: DeliveryState = INITIAL_STATE;
    for (;;) {
      switch (state.kind) {
        case 'attempting':
          try {
            await withTimeout(
              this.deps.sink.put(coords, [{ timestampMs: this.now(), message }]),
              this.opts.sinkTimeoutMs,
              `${this.deps.sink.name} put`,
            );
            state = transition(state, { type: 'acknowledged' }, this.opts, this.now());
          } catch (err) {
            state = transition(state, { type: 'rejected', error: err }, this.opts, this.now());
          }
          break;
        case 'backoff': {
          const attempt: DeliveryAttempt = {
            recordRef: record.traceId,
            attemptNumber: state.attempt,
            backoffDeadline: state.deadline,
          };
          log.warn({ ...attempt, delayMs: state.delayMs }, 'delivery-throttled');
          deliveryRetriesTotal.inc();
          deliveryBackoffMs.observe(state.delayMs);
          await this.sleep(state.delayMs);
          state = transition(state, { type: 'wake' }, this.opts, this.now());
          break;
        }
        case 'succeeded':
          log.info({ traceId: record.traceId, attempts: state.attempts }, 'delivery-succeeded');
          return { status: 'succeeded', attempts: state.attempts };
        case 'failed':
          log.error(
            { traceId: record.traceId, attempts: state.attempts, error: errorName(state.error) },
            'delivery-failed',
          );
          return { status: 'failed', attempts: state.attempts, error: state.error };
      }
    }
  }

  /** One pass over the pending area, then retention. `dryRun` changes nothing on disk or remotely. */
  async deliverAll(opts: { dryRun?: boolean } = {}): Promise<DeliveryReport> {
    const dryRun = !!opts.dryRun;
    const log = getLogger();
    const { records, ledger } = this.deps;
    const report: DeliveryReport = {
      succeeded: 0,
      failed: 0,
      skipped: 0,
      acknowledged: 0,
      previewed: 0,
      failures: [],
      purge: { deleted: [], wouldDelete: [] },
      aborted: false,
    };

    for (const handle of await records.listPending()) {
      if (report.aborted) {
        report.skipped++;
        deliveriesTotal.inc({ result: 'skipped' });
        continue;
      }
      let record: AuditRecord;
      try {
        record = await records.read(handle);
      } catch (err) {
        report.skipped++;
        report.failures.push({ name: handle.name, reason: err instanceof Error ? err.message : String(err) });
        deliveriesTotal.inc({ result: 'skipped' });
        log.warn({ file: handle.name, error: errorName(err) }, 'delivery-unreadable-record');
        continue;
      }

      if (dryRun) {
        report.previewed++;
        log.info({ traceId: record.traceId, file: handle.name }, 'delivery-preview');
        continue;
      }

      if (await ledger.has(record.recordHash)) {
        // delivered by an earlier run that stopped before the move
        await this.moveDelivered(handle, record, report);
        report.acknowledged++;
        deliveriesTotal.inc({ result: 'acknowledged' });
        continue;
      }

      const outcome = await this.deliverOne(record);
      if (outcome.status === 'succeeded') {
        try {
          await ledger.record(record.recordHash, record.traceId, new Date(this.now()));
        } catch (err) {
          // accepted remotely but not remembered: stays pending and is sent again next run
          report.failed++;
          deliveriesTotal.inc({ result: 'failed' });
          report.failures.push({
            name: handle.name,
            traceId: record.traceId,
            reason: `ledger write failed: ${err instanceof Error ? err.message : String(err)}`,
          });
          log.error({ traceId: record.traceId, error: errorName(err) }, 'delivery-ledger-write-failed');
          continue;
        }
        await this.moveDelivered(handle, record, report);
        report.succeeded++;
        deliveriesTotal.inc({ result: 'succeeded' });
        if (this.opts.pacingMs > 0) await this.sleep(this.opts.pacingMs);
        continue;
      }

      report.failed++;
      deliveriesTotal.inc({ result: 'failed' });
      report.failures.push({
        name: handle.name,
        traceId: record.traceId,
        reason: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
      });
      if (outcome.error instanceof AuthError) {
        report.aborted = true;
        log.error({ traceId: record.traceId }, 'delivery-aborted-auth');
      }
    }

    report.purge = await records.purgeProcessedOlderThan(this.opts.retentionDays * DAY_MS, {
      dryRun,
      now: this.now(),
    });
    if (!dryRun) {
      await ledger.compact(async (entry) => (await records.locate(recordFileName(entry.traceId))) !== null);
    }
    log.info(
      {
        succeeded: report.succeeded,
        failed: report.failed,
        skipped: report.skipped,
        acknowledged: report.acknowledged,
        previewed: report.previewed,
        aborted: report.aborted,
        dryRun,
      },
      'delivery-run-complete',
    );
    return report;
  }

  private async moveDelivered(handle: RecordHandle, record: AuditRecord, report: DeliveryReport): Promise<void> {
    try {
      await this.deps.records.moveToProcessed(handle);
    } catch (err) {
      // the ledger entry makes the next run finish the move
      report.failures.push({ name: handle.name, traceId: record.traceId, reason: `move failed: ${errorName(err)}` });
      getLogger().error({ traceId: record.traceId, error: errorName(err) }, 'delivery-move-failed');
    }
  }
}
