import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import fs from 'fs';
import type { KeyObject } from 'crypto';
import { ChainStateRepository, type ChainState } from '../../src/repositories/chainStateRepository.js';
import { RecordRepository } from '../../src/repositories/recordRepository.js';
import { recordLocator } from '../../src/services/auditPipeline.js';
import { IntegrityError } from '../../src/core/errors.js';
import { orderRecordsByChain, verifyRecordChain } from '../../src/utils/chainIntegrity.js';
import { generateKeyPair, loadSigningKeys } from '../../src/utils/keys.js';
import { tempDir } from '../utils/fakes.js';
import { buildRecord } from '../utils/records.js';

describe('ChainStateRepository', () => {
  let privateKey: KeyObject;
  let publicKey: KeyObject;
  let logDir: string;
  let records: RecordRepository;
  let chain: ChainStateRepository;

  const append = (repo = chain) =>
    repo.append(
      (lastHash) => buildRecord(privateKey, lastHash),
      (r) => records.persist(r),
    );

  const writeState = (state: Partial<ChainState>) =>
    fs.writeFileSync(
      chain.file,
      JSON.stringify({
        lastHash: null,
        lastTraceId: null,
        recordCount: 0,
        revision: 0,
        updatedAt: null,
        inFlight: null,
        halted: null,
        ...state,
      }),
    );

  beforeAll(() => {
    const keyDir = tempDir('audit-state-keys-');
    generateKeyPair(keyDir);
    ({ privateKey, publicKey } = loadSigningKeys(keyDir));
  });

  beforeEach(() => {
    logDir = tempDir('audit-state-');
    records = new RecordRepository(logDir);
    chain = new ChainStateRepository(logDir, recordLocator(records));
  });

  it('starts at genesis', async () => {
    const { record } = await append();
    expect(record.prevHash).toBeNull();
    expect(await chain.read()).toMatchObject({ lastHash: record.recordHash, recordCount: 1, revision: 1, inFlight: null });
  });

  it('keeps a single linear chain under concurrent appends', async () => {
    const second = new ChainStateRepository(logDir, recordLocator(records));
    const results = await Promise.all([append(), append(second), append(), append(second), append(), append(second)]);
    const created = results.map((r) => r.record);
    expect(new Set(created.map((r) => r.prevHash)).size).toBe(6);
    const ordered = orderRecordsByChain(created);
    expect(verifyRecordChain(ordered, publicKey).valid).toBe(true);
    const state = await chain.read();
    expect(state.recordCount).toBe(6);
    expect(state.lastHash).toBe(ordered[5].recordHash);
  });

  it('refuses to append while halted and resumes after resolve', async () => {
    const { record } = await append();
    await chain.halt('manual check');
    await expect(append()).rejects.toBeInstanceOf(IntegrityError);
    expect((await chain.read()).halted?.reason).toBe('manual check');

    await chain.resolve(record.recordHash, record.traceId);
    const next = await append();
    expect(next.record.prevHash).toBe(record.recordHash);
  });

  it('rolls a persisted in-flight record forward', async () => {
    const crashed = buildRecord(privateKey, null);
    await records.persist(crashed);
    writeState({ inFlight: { recordHash: crashed.recordHash, prevHash: null, traceId: crashed.traceId } });

    const { record } = await append();
    expect(record.prevHash).toBe(crashed.recordHash);
    expect(await chain.read()).toMatchObject({ recordCount: 2, lastHash: record.recordHash });
  });

  it('discards an intent whose record never reached the store', async () => {
    const lost = buildRecord(privateKey, null);
    writeState({ inFlight: { recordHash: lost.recordHash, prevHash: null, traceId: lost.traceId } });

    const { record } = await append();
    expect(record.prevHash).toBeNull();
    expect((await chain.read()).recordCount).toBe(1);
  });

  it('halts when the state moves underneath an append', async () => {
    await append();
    const moving = chain.append(
      (lastHash) => buildRecord(privateKey, lastHash),
      async (r) => {
        const handle = await records.persist(r);
        const current = await chain.read();
        fs.writeFileSync(chain.file, JSON.stringify({ ...current, revision: current.revision + 7 }));
        return handle;
      },
    );
    await expect(moving).rejects.toBeInstanceOf(IntegrityError);
    expect((await chain.read()).halted?.reason).toMatch(/revision moved/);
    await expect(append()).rejects.toThrow(/halted/);
  });

  it('rejects a malformed state file', async () => {
    fs.writeFileSync(chain.file, '{"lastHash": 42}');
    await expect(chain.read()).rejects.toBeInstanceOf(IntegrityError);
  });
});
