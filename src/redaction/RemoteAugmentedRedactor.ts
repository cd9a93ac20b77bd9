import { RedactionDegradedError, errorName, type DegradationReason } from '../core/errors.js';
import type { NlpAnalysis, RedactionResult } from '../core/types.js';
import { analysisFailuresTotal, piiFindingsTotal, redactionDegradedTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { codePointBoundaries, truncateUtf8 } from '../utils/utf8.js';
import type { IPiiRedactor } from './IPiiRedactor.js';
import type { IRemoteClassifier, RemotePiiEntity } from './IRemoteClassifier.js';
import { LOCAL_LIMITATIONS, REMOTE_LIMITATIONS, maskText, piiScore, type Span } from './patterns.js';

export interface RemoteRedactionOptions {
  confidenceThreshold: number;
  timeoutMs: number;
  maxRemoteBytes: number;
}

/**
 * Remote classifier first, local patterns always. Overlapping spans keep the
 * remote finding; any remote failure degrades to the local tier and is recorded
 * in the result instead of being raised.
 */
export class RemoteAugmentedRedactor implements IPiiRedactor {
  readonly kind = 'remote-augmented';

  constructor(
    private readonly classifier: IRemoteClassifier,
    private readonly opts: RemoteRedactionOptions,
  ) {}

  async mask(text: string, language: string): Promise<RedactionResult> {
    let remoteSpans: Span[] = [];
    let degradedReason: DegradationReason | undefined;
    let truncated = false;

    if (text.trim()) {
      if (!this.classifier.supportsPii(language)) {
        degradedReason = 'unsupported_language';
      } else {
        const submitted = truncateUtf8(text, this.opts.maxRemoteBytes);
        truncated = submitted.length < text.length;
        try {
          const entities = await withTimeout(
            this.classifier.detectPii(submitted, language),
            this.opts.timeoutMs,
            `${this.classifier.name} PII detection`,
          );
          remoteSpans = this.toSpans(entities, submitted);
        } catch (err) {
          degradedReason = classifyFailure(err);
        }
      }
    }

    if (degradedReason) {
      redactionDegradedTotal.inc({ reason: degradedReason });
      getLogger().warn(
        { reason: degradedReason, language, classifier: this.classifier.name },
        'pii-redaction-degraded',
      );
    }

    const { maskedText, findings, maskedChars } = maskText(text, remoteSpans);
    for (const f of findings) piiFindingsTotal.inc({ category: f.category, detector: f.detector });

    const remoteRan = text.trim() !== '' && degradedReason === undefined;
    const limitations = remoteRan ? REMOTE_LIMITATIONS.slice() : LOCAL_LIMITATIONS.slice();
    if (remoteRan && truncated) {
      limitations.push(`remote classifier saw only the first ${this.opts.maxRemoteBytes} bytes`);
    }
    return {
      maskedText,
      findings,
      detectorUsed: remoteRan ? 'remote_classifier' : 'local_pattern',
      totalMasked: findings.length,
      score: piiScore(text.length, maskedChars),
      limitations,
      ...(degradedReason ? { degradedReason } : {}),
    };
  }

  async analyze(text: string, language: string): Promise<NlpAnalysis | undefined> {
    if (!text.trim()) return undefined;
    try {
      return await withTimeout(
        this.classifier.analyze(text, language),
        this.opts.timeoutMs,
        `${this.classifier.name} analysis`,
      );
    } catch (err) {
      analysisFailuresTotal.inc({ part: 'all' });
      getLogger().warn({ error: errorName(err), language }, 'nlp-analysis-failed');
      return undefined;
    }
  }

  // Remote offsets count code points; JS strings index UTF-16 code units
  private toSpans(entities: RemotePiiEntity[], submitted: string): Span[] {
    const bounds = codePointBoundaries(submitted);
    const codePoints = bounds.length - 1;
    return entities
      .filter((e) => e.score >= this.opts.confidenceThreshold)
      .filter((e) => e.beginOffset >= 0 && e.endOffset <= codePoints && e.beginOffset < e.endOffset)
      .map((e) => ({
        start: bounds[e.beginOffset],
        end: bounds[e.endOffset],
        category: e.type.toLowerCase(),
        detector: 'remote_classifier' as const,
        priority: 0,
      }));
  }
}

function classifyFailure(err: unknown): DegradationReason {
  if (err instanceof TimeoutError) return 'timeout';
  if (err instanceof RedactionDegradedError) return err.reason;
  return 'unavailable';
}
