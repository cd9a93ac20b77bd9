import fs from 'fs';
import path from 'path';
import lockfile from 'proper-lockfile';
import { z } from 'zod';
import { IntegrityError, RecordStoreError } from '../core/errors.js';
import type { AuditRecord } from '../core/types.js';
import { getLogger } from '../utils/logging.js';

export const CHAIN_STATE_FILE = '.chain-state.json';

const sha256 = z.string().regex(/^[0-9a-f]{64}$/);

const intentSchema = z.object({
  recordHash: sha256,
  prevHash: sha256.nullable(),
  traceId: z.string(),
});

const chainStateSchema = z.object({
  lastHash: sha256.nullable(),
  lastTraceId: z.string().nullable(),
  recordCount: z.number().int().nonnegative(),
  revision: z.number().int().nonnegative(),
  updatedAt: z.string().nullable(),
  inFlight: intentSchema.nullable(),
  halted: z.object({ reason: z.string(), at: z.string() }).nullable(),
});

export type ChainIntent = z.infer<typeof intentSchema>;
export type ChainState = z.infer<typeof chainStateSchema>;

/** Answers whether the record announced by an intent reached the store. */
export type RecordLocator = (intent: ChainIntent) => Promise<boolean>;

const GENESIS: ChainState = {
  lastHash: null,
  lastTraceId: null,
  recordCount: 0,
  revision: 0,
  updatedAt: null,
  inFlight: null,
  halted: null,
};

const LOCK_OPTIONS = {
  realpath: false,
  stale: 15_000,
  retries: { retries: 10, factor: 1.5, minTimeout: 20, maxTimeout: 500 },
};

// Serializes appends within this process; the file lock covers other processes
const queues = new Map<string, Promise<unknown>>();

/**
 * Owns the chain tip. Reading `lastHash`, building, persisting and advancing the
 * tip happen under one inter-process lock, so two writers can never both link to
 * the same predecessor.
 */
export class ChainStateRepository {
  readonly file: string;

  constructor(
    logDir: string,
    private readonly locate: RecordLocator,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.file = path.join(path.resolve(logDir), CHAIN_STATE_FILE);
  }

  async read(): Promise<ChainState> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.file, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { ...GENESIS };
      throw new RecordStoreError(`Failed to read chain state ${this.file}`, err);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new IntegrityError(`Chain state ${this.file} is not valid JSON`, err);
    }
    const result = chainStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new IntegrityError(`Chain state ${this.file} is malformed`);
    }
    return result.data;
  }

  /**
   * Builds the next record from the current tip, persists it and advances the
   * tip. Throws IntegrityError while the chain is halted.
   */
  append<T>(
    build: (lastHash: string | null) => AuditRecord,
    persist: (record: AuditRecord) => Promise<T>,
  ): Promise<{ record: AuditRecord; stored: T }> {
    return this.serialized(() => this.withLock(() => this.appendLocked(build, persist)));
  }

  /** Marks the chain inconsistent; appends refuse until `resolve`. */
  halt(reason: string): Promise<ChainState> {
    return this.serialized(() => this.withLock(() => this.haltLocked(reason)));
  }

  /** Clears a halt after the caller verified the chain up to `lastHash`. */
  resolve(lastHash: string | null, lastTraceId: string | null, recordCount?: number): Promise<ChainState> {
    return this.serialized(() =>
      this.withLock(async () => {
        const state = await this.read();
        const next: ChainState = {
          ...state,
          lastHash,
          lastTraceId,
          recordCount: recordCount ?? state.recordCount,
          revision: state.revision + 1,
          inFlight: null,
          halted: null,
          updatedAt: this.now().toISOString(),
        };
        await this.write(next);
        getLogger().warn({ lastHash, previousHash: state.lastHash }, 'chain-state-resolved');
        return next;
      }),
    );
  }

  private async appendLocked<T>(
    build: (lastHash: string | null) => AuditRecord,
    persist: (record: AuditRecord) => Promise<T>,
  ): Promise<{ record: AuditRecord; stored: T }> {
    let state = await this.reconcile(await this.read());
    if (state.halted) {
      throw new IntegrityError(`Audit chain halted: ${state.halted.reason}; run "ai-audit resolve-chain"`);
    }

    const record = build(state.lastHash);
    if (record.prevHash !== state.lastHash) {
      throw new IntegrityError(`Record ${record.traceId} does not link to the chain tip`);
    }

    state = {
      ...state,
      inFlight: { recordHash: record.recordHash, prevHash: record.prevHash, traceId: record.traceId },
    };
    await this.write(state);
    const stored = await persist(record);

    const current = await this.read();
    if (current.revision !== state.revision) {
      await this.haltLocked(`chain state revision moved from ${state.revision} to ${current.revision} during append`);
      throw new IntegrityError(`Concurrent chain state update detected while appending ${record.traceId}`);
    }

    await this.write({
      ...state,
      lastHash: record.recordHash,
      lastTraceId: record.traceId,
      recordCount: state.recordCount + 1,
      revision: state.revision + 1,
      inFlight: null,
      updatedAt: this.now().toISOString(),
    });
    return { record, stored };
  }

  // An intent left behind by a crash between persist and commit
  private async reconcile(state: ChainState): Promise<ChainState> {
    const intent = state.inFlight;
    if (!intent) return state;
    const log = getLogger();
    let next: ChainState;
    if (intent.prevHash === state.lastHash && (await this.locate(intent))) {
      next = {
        ...state,
        lastHash: intent.recordHash,
        lastTraceId: intent.traceId,
        recordCount: state.recordCount + 1,
        revision: state.revision + 1,
        inFlight: null,
        updatedAt: this.now().toISOString(),
      };
      log.warn({ traceId: intent.traceId, recordHash: intent.recordHash }, 'chain-intent-rolled-forward');
    } else {
      next = { ...state, inFlight: null, revision: state.revision + 1, updatedAt: this.now().toISOString() };
      log.warn({ traceId: intent.traceId }, 'chain-intent-discarded');
    }
    await this.write(next);
    return next;
  }

  private async haltLocked(reason: string): Promise<ChainState> {
    const state = await this.read();
    const next: ChainState = {
      ...state,
      halted: { reason, at: this.now().toISOString() },
      revision: state.revision + 1,
      updatedAt: this.now().toISOString(),
    };
    await this.write(next);
    getLogger().error({ reason }, 'chain-halted');
    return next;
  }

  private async write(state: ChainState): Promise<void> {
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.file), { recursive: true, mode: 0o700 });
      await fs.promises.writeFile(tmp, JSON.stringify(state, null, 2), { mode: 0o600 });
      await fs.promises.rename(tmp, this.file);
    } catch (err) {
      throw new RecordStoreError(`Failed to write chain state ${this.file}`, err);
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await fs.promises.mkdir(path.dirname(this.file), { recursive: true, mode: 0o700 });
    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.file, LOCK_OPTIONS);
    } catch (err) {
      throw new RecordStoreError(`Could not acquire chain lock for ${this.file}`, err);
    }
    try {
      return await fn();
    } finally {
      await release();
    }
  }

  private serialized<T>(fn: () => Promise<T>): Promise<T> {
    const previous = queues.get(this.file) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    queues.set(
      this.file,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }
}
