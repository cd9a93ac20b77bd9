import fs from 'fs';
import path from 'path';
import { RecordStoreError } from '../core/errors.js';
import { auditRecordSchema } from '../core/schemas.js';
import type { AuditRecord, RecordArea, RecordHandle } from '../core/types.js';
import { processedPurgedTotal } from '../metrics/index.js';
import { orderRecordsByChain } from '../utils/chainIntegrity.js';
import { getLogger } from '../utils/logging.js';

export interface PurgeResult {
  deleted: string[];
  wouldDelete: string[];
}

export interface PurgeOptions {
  dryRun?: boolean;
  now?: number;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/** File name for a record: the uuid part of its trace id. */
export function recordFileName(traceId: string): string {
  return `${traceId.split(':')[0]}.json`;
}

/**
 * Pending records live directly in the log directory, delivered ones under
 * `processed/`. Hidden files (temp files, chain state, ledger) are never records.
 */
export class RecordRepository {
  readonly pendingDir: string;
  readonly processedDir: string;

  constructor(logDir: string) {
    this.pendingDir = path.resolve(logDir);
    this.processedDir = path.join(this.pendingDir, 'processed');
  }

  async persist(record: AuditRecord): Promise<RecordHandle> {
    const name = recordFileName(record.traceId);
    const target = path.join(this.pendingDir, name);
    const tmp = path.join(this.pendingDir, `.${name}.${process.pid}.tmp`);
    try {
      await fs.promises.mkdir(this.pendingDir, { recursive: true, mode: 0o700 });
      await fs.promises.writeFile(tmp, JSON.stringify(record, null, 2), { mode: 0o600, flag: 'wx' });
      // link() refuses an existing target, so a name collision never overwrites a record
      await fs.promises.link(tmp, target);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true });
      if (isErrno(err, 'EEXIST')) {
        throw new RecordStoreError(`Record ${name} already exists`, err);
      }
      throw new RecordStoreError(`Failed to persist record ${name}`, err);
    }
    await fs.promises.rm(tmp, { force: true });
    const stat = await fs.promises.stat(target);
    return { name, path: target, area: 'pending', createdAtMs: stat.mtimeMs };
  }

  /** Oldest first; readable records are then re-ordered along their chain links. */
  async listPending(): Promise<RecordHandle[]> {
    const handles = await this.list('pending');
    const readable: { slot: number; handle: RecordHandle; prevHash: string | null; recordHash: string }[] = [];
    for (let i = 0; i < handles.length; i++) {
      try {
        const record = await this.read(handles[i]);
        readable.push({ slot: i, handle: handles[i], prevHash: record.prevHash, recordHash: record.recordHash });
      } catch {
        // unreadable records keep their time-ordered slot
        continue;
      }
    }
    const chained = orderRecordsByChain(readable);
    const out = handles.slice();
    readable.forEach((entry, i) => {
      out[entry.slot] = chained[i].handle;
    });
    return out;
  }

  listProcessed(): Promise<RecordHandle[]> {
    return this.list('processed');
  }

  async read(handle: RecordHandle): Promise<AuditRecord> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(handle.path, 'utf8'));
    } catch (err) {
      throw new RecordStoreError(`Unreadable record ${handle.name}`, err);
    }
    const parsed = auditRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RecordStoreError(`Malformed record ${handle.name}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  /** Looks a record up by file name in either area. */
  async locate(name: string): Promise<RecordHandle | null> {
    for (const area of ['pending', 'processed'] as const) {
      const file = path.join(this.dirFor(area), name);
      try {
        const stat = await fs.promises.stat(file);
        return { name, path: file, area, createdAtMs: stat.mtimeMs };
      } catch (err) {
        if (!isErrno(err, 'ENOENT')) throw new RecordStoreError(`Failed to stat ${file}`, err);
      }
    }
    return null;
  }

  async moveToProcessed(handle: RecordHandle): Promise<RecordHandle> {
    const target = path.join(this.processedDir, handle.name);
    try {
      await fs.promises.mkdir(this.processedDir, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw new RecordStoreError(`Failed to create ${this.processedDir}`, err);
    }
    if (fs.existsSync(target)) {
      throw new RecordStoreError(`Processed record ${handle.name} already exists`);
    }
    try {
      await fs.promises.rename(handle.path, target);
    } catch (err) {
      throw new RecordStoreError(`Failed to move record ${handle.name} to processed`, err);
    }
    return { ...handle, path: target, area: 'processed' };
  }

  /** Deletes processed records whose mtime is older than `now - maxAgeMs`. */
  async purgeProcessedOlderThan(maxAgeMs: number, opts: PurgeOptions = {}): Promise<PurgeResult> {
    const cutoff = (opts.now ?? Date.now()) - maxAgeMs;
    const result: PurgeResult = { deleted: [], wouldDelete: [] };
    for (const handle of await this.list('processed')) {
      if (handle.createdAtMs >= cutoff) continue;
      if (opts.dryRun) {
        result.wouldDelete.push(handle.name);
        continue;
      }
      try {
        await fs.promises.unlink(handle.path);
      } catch (err) {
        if (isErrno(err, 'ENOENT')) continue;
        throw new RecordStoreError(`Failed to purge ${handle.name}`, err);
      }
      result.deleted.push(handle.name);
    }
    if (result.deleted.length) processedPurgedTotal.inc({ mode: 'deleted' }, result.deleted.length);
    if (result.wouldDelete.length) processedPurgedTotal.inc({ mode: 'dry_run' }, result.wouldDelete.length);
    getLogger().info(
      { deleted: result.deleted.length, wouldDelete: result.wouldDelete.length, dryRun: !!opts.dryRun },
      'processed-retention',
    );
    return result;
  }

  private dirFor(area: RecordArea): string {
    return area === 'pending' ? this.pendingDir : this.processedDir;
  }

  private async list(area: RecordArea): Promise<RecordHandle[]> {
    const dir = this.dirFor(area);
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return [];
      throw new RecordStoreError(`Failed to list ${dir}`, err);
    }
    const handles: RecordHandle[] = [];
    for (const name of names) {
      if (name.startsWith('.') || !name.endsWith('.json')) continue;
      const file = path.join(dir, name);
      try {
        const stat = await fs.promises.stat(file);
        if (stat.isFile()) handles.push({ name, path: file, area, createdAtMs: stat.mtimeMs });
      } catch (err) {
        // moved or purged by a concurrent run
        if (!isErrno(err, 'ENOENT')) throw new RecordStoreError(`Failed to stat ${file}`, err);
      }
    }
    return handles.sort((a, b) => a.createdAtMs - b.createdAtMs || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
