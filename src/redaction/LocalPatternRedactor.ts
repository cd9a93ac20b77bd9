import type { NlpAnalysis, RedactionResult } from '../core/types.js';
import { piiFindingsTotal } from '../metrics/index.js';
import type { IPiiRedactor } from './IPiiRedactor.js';
import { LOCAL_LIMITATIONS, maskText, piiScore } from './patterns.js';

export class LocalPatternRedactor implements IPiiRedactor {
  readonly kind = 'local-pattern';

  async mask(text: string, _language: string): Promise<RedactionResult> {
    return this.maskSync(text);
  }

  maskSync(text: string): RedactionResult {
    const { maskedText, findings, maskedChars } = maskText(text);
    for (const f of findings) piiFindingsTotal.inc({ category: f.category, detector: f.detector });
    return {
      maskedText,
      findings,
      detectorUsed: 'local_pattern',
      totalMasked: findings.length,
      score: piiScore(text.length, maskedChars),
      limitations: LOCAL_LIMITATIONS.slice(),
    };
  }

  async analyze(_text: string, _language: string): Promise<NlpAnalysis | undefined> {
    return undefined;
  }
}
