import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { RecordStoreError } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';

export const LEDGER_FILE = '.delivery-ledger.jsonl';

const entrySchema = z.object({
  recordHash: z.string().regex(/^[0-9a-f]{64}$/),
  traceId: z.string(),
  at: z.string(),
});

export type LedgerEntry = z.infer<typeof entrySchema>;

/**
 * Append-only list of record hashes the sink acknowledged. Written (and fsync'd)
 * before a delivered record leaves the pending area, so a crash in between makes
 * the next run move the record instead of submitting it again.
 */
export class AcknowledgementLedger {
  readonly file: string;
  private entries: Map<string, LedgerEntry> | null = null;

  constructor(logDir: string) {
    this.file = path.join(path.resolve(logDir), LEDGER_FILE);
  }

  async has(recordHash: string): Promise<boolean> {
    return (await this.load()).has(recordHash);
  }

  async record(recordHash: string, traceId: string, at: Date = new Date()): Promise<void> {
    const entry: LedgerEntry = { recordHash, traceId, at: at.toISOString() };
    let handle: FileHandle | undefined;
    try {
      await fs.promises.mkdir(path.dirname(this.file), { recursive: true, mode: 0o700 });
      handle = await fs.promises.open(this.file, 'a', 0o600);
      await handle.write(JSON.stringify(entry) + '\n');
      await handle.sync();
    } catch (err) {
      throw new RecordStoreError(`Failed to append to delivery ledger ${this.file}`, err);
    } finally {
      await handle?.close();
    }
    (await this.load()).set(recordHash, entry);
  }

  async list(): Promise<LedgerEntry[]> {
    return [...(await this.load()).values()];
  }

  /** Rewrites the ledger keeping only entries `keep` accepts; returns how many were dropped. */
  async compact(keep: (entry: LedgerEntry) => Promise<boolean>): Promise<number> {
    const entries = await this.load();
    const retained: LedgerEntry[] = [];
    for (const entry of entries.values()) {
      if (await keep(entry)) retained.push(entry);
    }
    const dropped = entries.size - retained.length;
    if (dropped === 0) return 0;
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      await fs.promises.writeFile(tmp, retained.map((e) => JSON.stringify(e) + '\n').join(''), { mode: 0o600 });
      await fs.promises.rename(tmp, this.file);
    } catch (err) {
      throw new RecordStoreError(`Failed to compact delivery ledger ${this.file}`, err);
    }
    this.entries = new Map(retained.map((e) => [e.recordHash, e]));
    getLogger().debug({ dropped, retained: retained.length }, 'delivery-ledger-compacted');
    return dropped;
  }

  private async load(): Promise<Map<string, LedgerEntry>> {
    if (this.entries) return this.entries;
    let raw = '';
    try {
      raw = await fs.promises.readFile(this.file, 'utf8');
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        throw new RecordStoreError(`Failed to read delivery ledger ${this.file}`, err);
      }
    }
    const entries = new Map<string, LedgerEntry>();
    let skipped = 0;
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        // a torn final line from a crash mid-append
        skipped++;
        continue;
      }
      const result = entrySchema.safeParse(parsed);
      if (result.success) entries.set(result.data.recordHash, result.data);
      else skipped++;
    }
    if (skipped) getLogger().warn({ skipped, file: this.file }, 'delivery-ledger-lines-skipped');
    this.entries = entries;
    return entries;
  }
}
