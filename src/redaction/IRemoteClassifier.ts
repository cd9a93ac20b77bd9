import type { NlpAnalysis } from '../core/types.js';

/** PII entity as reported by a remote classifier; offsets count code points of the submitted text. */
export interface RemotePiiEntity {
  type: string;
  score: number;
  beginOffset: number;
  endOffset: number;
}

/**
 * Remote NLP classifier used by the remote-augmented redactor.
 * `detectPii` may throw; callers fall back to the local pattern tier.
 */
export interface IRemoteClassifier {
  readonly name: string;
  supportsPii(language: string): boolean;
  detectPii(text: string, language: string): Promise<RemotePiiEntity[]>;
  /** Best-effort sentiment / key phrases / entities; parts that fail are left out. */
  analyze(text: string, language: string): Promise<NlpAnalysis>;
}
