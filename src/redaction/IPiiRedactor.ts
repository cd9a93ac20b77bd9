import type { NlpAnalysis, RedactionResult } from '../core/types.js';

/**
 * PII redaction tier. Implementations never throw from `mask` because of a remote
 * failure; the result states which tier actually ran.
 */
export interface IPiiRedactor {
  readonly kind: 'local-pattern' | 'remote-augmented';
  mask(text: string, language: string): Promise<RedactionResult>;
  /** Auxiliary signal only: independent of masking, `undefined` when unavailable. */
  analyze(text: string, language: string): Promise<NlpAnalysis | undefined>;
}
