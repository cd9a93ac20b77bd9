import { describe, it, expect, beforeAll } from 'vitest';
import { generateKeyPair, loadSigningKeys, type SigningKeys } from '../../src/utils/keys.js';
import { AuditRecordBuilder, toPiiDetection } from '../../src/services/recordBuilder.js';
import { LocalPatternRedactor } from '../../src/redaction/LocalPatternRedactor.js';
import { auditRecordSchema } from '../../src/core/schemas.js';
import { computeRecordHash, sha256Hex } from '../../src/utils/hashChain.js';
import { verifyRecord } from '../../src/utils/chainIntegrity.js';
import { newTraceId } from '../../src/utils/traceId.js';
import { tempDir } from '../utils/fakes.js';
import { buildRecord } from '../utils/records.js';

describe('AuditRecordBuilder', () => {
  let keys: SigningKeys;
  let otherKeys: SigningKeys;

  beforeAll(() => {
    const dir = tempDir('audit-builder-');
    generateKeyPair(dir);
    keys = loadSigningKeys(dir);
    const other = tempDir('audit-builder-other-');
    generateKeyPair(other);
    otherKeys = loadSigningKeys(other);
  });

  it('builds a schema-valid genesis record', () => {
    const prompt = 'Contact: test@example.com, Phone: 090-1234-5678';
    const masked = new LocalPatternRedactor().maskSync(prompt);
    const builder = new AuditRecordBuilder(keys.privateKey, () => new Date('2024-05-01T12:34:56.500Z'));
    const record = builder.build(
      newTraceId(),
      { method: 'chat', model: 'assistant-x', body: prompt, maskedBody: masked.maskedText, piiDetection: toPiiDetection(masked) },
      { status: 'success', content: 'ok' },
      { lastHash: null },
    );
    expect(auditRecordSchema.parse(record)).toEqual(record);
    expect(record.timestamp).toBe('2024-05-01T12:34:56Z');
    expect(record.prevHash).toBeNull();
    expect(record.request.bodyHash).toBe(sha256Hex(prompt));
    expect(record.response.contentHash).toBe(sha256Hex('ok'));
    expect(record.request.piiDetection).toMatchObject({ totalMasked: 2, score: 0.62, detectorUsed: 'local_pattern' });
    expect(record.recordHash).toBe(computeRecordHash(record));
  });

  it('omits optional fields that were not supplied', () => {
    const builder = new AuditRecordBuilder(keys.privateKey);
    const masked = new LocalPatternRedactor().maskSync('x');
    const record = builder.build(
      newTraceId(),
      { method: 'chat', body: 'x', piiDetection: toPiiDetection(masked) },
      { status: 'success', content: 'y' },
      { lastHash: null },
    );
    expect(Object.keys(record.request).sort()).toEqual(['bodyHash', 'method', 'piiDetection']);
    expect(Object.keys(record.response).sort()).toEqual(['contentHash', 'status']);
  });

  it('links to the given chain tip', () => {
    const first = buildRecord(keys.privateKey, null);
    const second = buildRecord(keys.privateKey, first.recordHash);
    expect(second.prevHash).toBe(first.recordHash);
    expect(second.recordHash).not.toBe(first.recordHash);
  });

  it('signs so that only the matching public key verifies', () => {
    const record = buildRecord(keys.privateKey, null);
    expect(verifyRecord(record, keys.publicKey)).toBe(true);
    expect(verifyRecord(record, otherKeys.publicKey)).toBe(false);
  });

  it('detects any field change', () => {
    const record = buildRecord(keys.privateKey, null);
    const tampered = structuredClone(record);
    tampered.response.status = 'error';
    expect(verifyRecord(tampered, keys.publicKey)).toBe(false);
  });
});
