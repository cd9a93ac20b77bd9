import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import type { KeyObject } from 'crypto';
import { RecordRepository, recordFileName } from '../../src/repositories/recordRepository.js';
import { RecordStoreError } from '../../src/core/errors.js';
import { generateKeyPair, loadSigningKeys } from '../../src/utils/keys.js';
import { tempDir } from '../utils/fakes.js';
import { buildChain, buildRecord } from '../utils/records.js';

const DAY = 24 * 60 * 60 * 1000;

function setMtime(file: string, ms: number) {
  fs.utimesSync(file, ms / 1000, ms / 1000);
}

describe('RecordRepository', () => {
  let privateKey: KeyObject;
  let logDir: string;
  let repo: RecordRepository;

  beforeAll(() => {
    const keyDir = tempDir('audit-store-keys-');
    generateKeyPair(keyDir);
    privateKey = loadSigningKeys(keyDir).privateKey;
  });

  beforeEach(() => {
    logDir = tempDir('audit-store-');
    repo = new RecordRepository(logDir);
  });

  it('persists a record under its trace uuid without leftovers', async () => {
    const record = buildRecord(privateKey, null);
    const handle = await repo.persist(record);
    expect(handle.name).toBe(recordFileName(record.traceId));
    expect(handle.name).toBe(`${record.traceId.slice(0, 36)}.json`);
    expect(fs.readdirSync(logDir)).toEqual([handle.name]);
    expect(await repo.read(handle)).toEqual(record);
  });

  it.skipIf(process.platform === 'win32')('writes records owner-only', async () => {
    const handle = await repo.persist(buildRecord(privateKey, null));
    expect(fs.statSync(handle.path).mode & 0o777).toBe(0o600);
  });

  it('never overwrites an existing record', async () => {
    const record = buildRecord(privateKey, null);
    await repo.persist(record);
    await expect(repo.persist({ ...record, response: { ...record.response, status: 'x' } })).rejects.toBeInstanceOf(
      RecordStoreError,
    );
    expect((await repo.read((await repo.listPending())[0])).response.status).toBe('success');
  });

  it('lists unlinked records oldest first by mtime', async () => {
    const [a, b, c] = [buildRecord(privateKey, null), buildRecord(privateKey, null), buildRecord(privateKey, null)];
    const ha = await repo.persist(a);
    const hb = await repo.persist(b);
    const hc = await repo.persist(c);
    setMtime(ha.path, 3_000_000);
    setMtime(hb.path, 1_000_000);
    setMtime(hc.path, 2_000_000);
    expect((await repo.listPending()).map((h) => h.name)).toEqual([hb.name, hc.name, ha.name]);
  });

  it('orders chained records along their links when mtimes tie', async () => {
    const chain = buildChain(privateKey, 4);
    for (const record of chain.slice().reverse()) {
      setMtime((await repo.persist(record)).path, 5_000_000);
    }
    const listed = await repo.listPending();
    expect(listed.map((h) => h.name)).toEqual(chain.map((r) => recordFileName(r.traceId)));
  });

  it('skips hidden files and keeps unreadable records in their slot', async () => {
    const good = await repo.persist(buildRecord(privateKey, null));
    fs.writeFileSync(path.join(logDir, 'broken.json'), '{ nope');
    fs.writeFileSync(path.join(logDir, '.chain-state.json'), '{}');
    setMtime(good.path, 2_000_000);
    setMtime(path.join(logDir, 'broken.json'), 1_000_000);
    const listed = await repo.listPending();
    expect(listed.map((h) => h.name)).toEqual(['broken.json', good.name]);
    await expect(repo.read(listed[0])).rejects.toThrow(/Unreadable record broken.json/);
  });

  it('rejects records that fail schema validation', async () => {
    fs.writeFileSync(path.join(logDir, 'partial.json'), JSON.stringify({ traceId: 'x' }));
    const [handle] = await repo.listPending();
    await expect(repo.read(handle)).rejects.toThrow(/Malformed record partial.json/);
  });

  it('moves records to processed and refuses to clobber', async () => {
    const record = buildRecord(privateKey, null);
    const handle = await repo.persist(record);
    const moved = await repo.moveToProcessed(handle);
    expect(moved.area).toBe('processed');
    expect(fs.existsSync(path.join(logDir, 'processed', handle.name))).toBe(true);
    expect(await repo.listPending()).toEqual([]);
    expect(await repo.locate(handle.name)).toMatchObject({ area: 'processed' });

    const again = await repo.persist(record);
    await expect(repo.moveToProcessed(again)).rejects.toThrow(/already exists/);
    expect(fs.existsSync(again.path)).toBe(true);
  });

  describe('retention', () => {
    const now = 1_700_000_000_000;

    async function processedAt(ageMs: number): Promise<string> {
      const handle = await repo.moveToProcessed(await repo.persist(buildRecord(privateKey, null)));
      setMtime(handle.path, now - ageMs);
      return handle.name;
    }

    it('deletes processed records older than the window only', async () => {
      const old = await processedAt(8 * DAY);
      const boundary = await processedAt(7 * DAY);
      const fresh = await processedAt(6 * DAY);
      const pending = await repo.persist(buildRecord(privateKey, null));
      setMtime(pending.path, now - 30 * DAY);

      const res = await repo.purgeProcessedOlderThan(7 * DAY, { now });
      expect(res).toEqual({ deleted: [old], wouldDelete: [] });
      expect((await repo.listProcessed()).map((h) => h.name).sort()).toEqual([boundary, fresh].sort());
      expect(fs.existsSync(pending.path)).toBe(true);
    });

    it('only reports in dry-run mode', async () => {
      const old = await processedAt(10 * DAY);
      const res = await repo.purgeProcessedOlderThan(7 * DAY, { now, dryRun: true });
      expect(res).toEqual({ deleted: [], wouldDelete: [old] });
      expect(await repo.locate(old)).not.toBeNull();
    });
  });
});
