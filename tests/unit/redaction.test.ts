import { describe, it, expect } from 'vitest';
import { LocalPatternRedactor } from '../../src/redaction/LocalPatternRedactor.js';
import { RemoteAugmentedRedactor } from '../../src/redaction/RemoteAugmentedRedactor.js';
import { createRedactor } from '../../src/redaction/RedactorFactory.js';
import { placeholderFor } from '../../src/redaction/patterns.js';
import { sha256Hex } from '../../src/utils/hashChain.js';
import { FakeClassifier } from '../utils/fakes.js';

const SCENARIO = 'Contact: test@example.com, Phone: 090-1234-5678';
const OPTS = { confidenceThreshold: 0.7, timeoutMs: 50, maxRemoteBytes: 100_000 };

describe('local pattern redaction', () => {
  const redactor = new LocalPatternRedactor();

  it('masks email and Japanese phone number', async () => {
    const res = await redactor.mask(SCENARIO, 'ja');
    expect(res.maskedText).toBe('Contact: [MASKED_EMAIL], Phone: [MASKED_PHONE_JP]');
    expect(res.totalMasked).toBe(2);
    expect(res.findings.map((f) => f.category)).toEqual(['email', 'phone_jp']);
    expect(res.findings[0].originalSpanHash).toBe(sha256Hex('test@example.com'));
    expect(res.detectorUsed).toBe('local_pattern');
    expect(res.score).toBe(0.62);
  });

  it('leaves no email address behind', async () => {
    const res = await redactor.mask('mail a.b+c@sub.example.org or X_Y@test.io now', 'en');
    expect(res.maskedText).toBe('mail [MASKED_EMAIL] or [MASKED_EMAIL] now');
  });

  it('prefers the longest overlapping match', async () => {
    const res = await redactor.mask('card 4111-1111-1111-1111', 'en');
    expect(res.maskedText).toBe('card [MASKED_CREDIT_CARD]');
    expect(res.totalMasked).toBe(1);
  });

  it('masks international numbers, My Number, postal codes and IPs', async () => {
    const res = await redactor.mask('+81-90-1234-5678 / 1234-5678-9012 / 〒150-0002 / 10.0.0.1', 'ja');
    expect(res.maskedText).toBe('[MASKED_PHONE_INTL] / [MASKED_MY_NUMBER] / 〒[MASKED_ZIP_CODE_JP] / [MASKED_IPV4]');
  });

  it('handles empty and clean input', async () => {
    expect(await redactor.mask('', 'ja')).toMatchObject({ maskedText: '', totalMasked: 0, score: 0 });
    const clean = await redactor.mask('nothing to see here', 'en');
    expect(clean.maskedText).toBe('nothing to see here');
    expect(clean.findings).toEqual([]);
  });

  it('never analyzes', async () => {
    expect(await redactor.analyze(SCENARIO, 'en')).toBeUndefined();
  });

  it('builds placeholders from categories', () => {
    expect(placeholderFor('credit-card number')).toBe('[MASKED_CREDIT_CARD_NUMBER]');
  });
});

describe('remote-augmented redaction', () => {
  const text = 'Name: John Smith, mail test@example.com';

  it('merges remote entities with local patterns, remote winning overlaps', async () => {
    const classifier = new FakeClassifier({
      entities: [
        { type: 'NAME', score: 0.99, beginOffset: 6, endOffset: 16 },
        { type: 'EMAIL', score: 0.9, beginOffset: 23, endOffset: 39 },
        { type: 'ADDRESS', score: 0.3, beginOffset: 0, endOffset: 4 },
      ],
    });
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask(text, 'en');
    expect(res.maskedText).toBe('Name: [MASKED_NAME], mail [MASKED_EMAIL]');
    expect(res.findings.map((f) => [f.category, f.detector])).toEqual([
      ['name', 'remote_classifier'],
      ['email', 'remote_classifier'],
    ]);
    expect(res.detectorUsed).toBe('remote_classifier');
    expect(res.degradedReason).toBeUndefined();
  });

  it('keeps local-only categories the classifier does not know', async () => {
    const classifier = new FakeClassifier({ entities: [] });
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask(SCENARIO, 'en');
    expect(res.maskedText).toBe('Contact: [MASKED_EMAIL], Phone: [MASKED_PHONE_JP]');
    expect(res.detectorUsed).toBe('remote_classifier');
  });

  it('falls back for unsupported languages without calling the classifier', async () => {
    const classifier = new FakeClassifier();
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask(SCENARIO, 'ja');
    expect(classifier.detected).toEqual([]);
    expect(res.degradedReason).toBe('unsupported_language');
    expect(res.detectorUsed).toBe('local_pattern');
    expect(res.maskedText).toBe('Contact: [MASKED_EMAIL], Phone: [MASKED_PHONE_JP]');
  });

  it('falls back when the classifier hangs', async () => {
    const classifier = new FakeClassifier({ detect: () => new Promise(() => undefined) });
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask(SCENARIO, 'en');
    expect(res.degradedReason).toBe('timeout');
    expect(res.totalMasked).toBe(2);
  });

  it('falls back when the classifier fails', async () => {
    const classifier = new FakeClassifier({ detect: () => Promise.reject(new Error('boom')) });
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask(SCENARIO, 'en');
    expect(res.degradedReason).toBe('unavailable');
    expect(res.detectorUsed).toBe('local_pattern');
  });

  it('ignores entities outside the submitted text', async () => {
    const classifier = new FakeClassifier({ entities: [{ type: 'NAME', score: 0.99, beginOffset: 5, endOffset: 500 }] });
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask('hello world', 'en');
    expect(res.maskedText).toBe('hello world');
  });

  it('maps code point offsets past astral characters', async () => {
    const input = '\u{1F600} Name: John Smith';
    const classifier = new FakeClassifier({ entities: [{ type: 'NAME', score: 0.99, beginOffset: 8, endOffset: 18 }] });
    const res = await new RemoteAugmentedRedactor(classifier, OPTS).mask(input, 'en');
    expect(res.maskedText).toBe('\u{1F600} Name: [MASKED_NAME]');
    expect(res.findings[0].originalSpanHash).toBe(sha256Hex('John Smith'));
  });

  it('notes truncation of oversized input', async () => {
    const classifier = new FakeClassifier();
    const res = await new RemoteAugmentedRedactor(classifier, { ...OPTS, maxRemoteBytes: 5 }).mask('hello world', 'en');
    expect(classifier.detected).toEqual(['hello']);
    expect(res.limitations).toContain('remote classifier saw only the first 5 bytes');
  });

  it('returns analysis and swallows analysis failures', async () => {
    const analysis = { keyPhrases: [{ text: 'deploy', score: 0.8 }] };
    const ok = new RemoteAugmentedRedactor(new FakeClassifier({ analysis }), OPTS);
    expect(await ok.analyze('please deploy', 'en')).toEqual(analysis);
    const failing = new RemoteAugmentedRedactor(new FakeClassifier({ analyzeError: new Error('down') }), OPTS);
    expect(await failing.analyze('please deploy', 'en')).toBeUndefined();
  });
});

describe('createRedactor', () => {
  it('picks the variant from the remote flag', () => {
    expect(createRedactor(false).kind).toBe('local-pattern');
    expect(createRedactor(true, new FakeClassifier()).kind).toBe('remote-augmented');
  });
});
