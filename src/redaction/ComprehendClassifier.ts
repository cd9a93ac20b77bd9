import {
  ComprehendClient,
  DetectEntitiesCommand,
  DetectKeyPhrasesCommand,
  DetectPiiEntitiesCommand,
  DetectSentimentCommand,
  type DetectEntitiesCommandInput,
  type DetectEntitiesCommandOutput,
  type DetectKeyPhrasesCommandInput,
  type DetectKeyPhrasesCommandOutput,
  type DetectPiiEntitiesCommandInput,
  type DetectPiiEntitiesCommandOutput,
  type DetectSentimentCommandInput,
  type DetectSentimentCommandOutput,
  type LanguageCode,
} from '@aws-sdk/client-comprehend';
import { RedactionDegradedError, errorName } from '../core/errors.js';
import type { NlpAnalysis } from '../core/types.js';
import { analysisFailuresTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { truncateUtf8 } from '../utils/utf8.js';
import type { IRemoteClassifier, RemotePiiEntity } from './IRemoteClassifier.js';

/** The four Comprehend operations used here; a seam for in-process fakes. */
export interface ComprehendApi {
  detectPiiEntities(input: DetectPiiEntitiesCommandInput): Promise<DetectPiiEntitiesCommandOutput>;
  detectSentiment(input: DetectSentimentCommandInput): Promise<DetectSentimentCommandOutput>;
  detectKeyPhrases(input: DetectKeyPhrasesCommandInput): Promise<DetectKeyPhrasesCommandOutput>;
  detectEntities(input: DetectEntitiesCommandInput): Promise<DetectEntitiesCommandOutput>;
}

export function comprehendApi(client: ComprehendClient): ComprehendApi {
  return {
    detectPiiEntities: (input) => client.send(new DetectPiiEntitiesCommand(input)),
    detectSentiment: (input) => client.send(new DetectSentimentCommand(input)),
    detectKeyPhrases: (input) => client.send(new DetectKeyPhrasesCommand(input)),
    detectEntities: (input) => client.send(new DetectEntitiesCommand(input)),
  };
}

// Comprehend PII detection covers English and Spanish only
const PII_LANGUAGES: readonly LanguageCode[] = ['en', 'es'];
const ANALYSIS_LANGUAGES: readonly LanguageCode[] = [
  'ar', 'de', 'en', 'es', 'fr', 'hi', 'it', 'ja', 'ko', 'pt', 'zh', 'zh-TW',
];

// Service-side request size limits (UTF-8 bytes)
const SENTIMENT_MAX_BYTES = 5_000;
const DETECT_MAX_BYTES = 100_000;

export interface ComprehendClassifierOptions {
  region: string;
  timeoutMs: number;
  api?: ComprehendApi;
}

export class ComprehendClassifier implements IRemoteClassifier {
  readonly name = 'amazon-comprehend';
  private readonly api: ComprehendApi;

  constructor(opts: ComprehendClassifierOptions) {
    this.api =
      opts.api ??
      comprehendApi(
        new ComprehendClient({
          region: opts.region,
          maxAttempts: 2,
          requestHandler: { requestTimeout: opts.timeoutMs, connectionTimeout: opts.timeoutMs },
        }),
      );
  }

  supportsPii(language: string): boolean {
    return PII_LANGUAGES.some((l) => l === language);
  }

  async detectPii(text: string, language: string): Promise<RemotePiiEntity[]> {
    const code = PII_LANGUAGES.find((l) => l === language);
    if (!code) {
      throw new RedactionDegradedError('unsupported_language', `PII detection unsupported for ${language}`);
    }
    let out: DetectPiiEntitiesCommandOutput;
    try {
      out = await this.api.detectPiiEntities({ Text: truncateUtf8(text, DETECT_MAX_BYTES), LanguageCode: code });
    } catch (err) {
      // Only the error name is surfaced: service messages can echo request text
      throw new RedactionDegradedError('unavailable', `Comprehend DetectPiiEntities failed: ${errorName(err)}`, err);
    }
    const entities: RemotePiiEntity[] = [];
    for (const e of out.Entities ?? []) {
      if (e.Type === undefined || e.Score === undefined) continue;
      if (e.BeginOffset === undefined || e.EndOffset === undefined) continue;
      entities.push({ type: e.Type, score: e.Score, beginOffset: e.BeginOffset, endOffset: e.EndOffset });
    }
    return entities;
  }

  async analyze(text: string, language: string): Promise<NlpAnalysis> {
    const code = ANALYSIS_LANGUAGES.find((l) => l === language);
    if (!code || !text.trim()) return {};
    const [sentiment, keyPhrases, entities] = await Promise.allSettled([
      this.api.detectSentiment({ Text: truncateUtf8(text, SENTIMENT_MAX_BYTES), LanguageCode: code }),
      this.api.detectKeyPhrases({ Text: truncateUtf8(text, DETECT_MAX_BYTES), LanguageCode: code }),
      this.api.detectEntities({ Text: truncateUtf8(text, DETECT_MAX_BYTES), LanguageCode: code }),
    ]);
    const analysis: NlpAnalysis = {};

    if (sentiment.status === 'fulfilled' && sentiment.value.Sentiment) {
      const s = sentiment.value.SentimentScore;
      analysis.sentiment = {
        label: sentiment.value.Sentiment,
        scores: {
          positive: s?.Positive ?? 0,
          negative: s?.Negative ?? 0,
          neutral: s?.Neutral ?? 0,
          mixed: s?.Mixed ?? 0,
        },
      };
    } else if (sentiment.status === 'rejected') {
      this.reportFailure('sentiment', sentiment.reason);
    }

    if (keyPhrases.status === 'fulfilled') {
      analysis.keyPhrases = (keyPhrases.value.KeyPhrases ?? []).flatMap((k) =>
        k.Text !== undefined ? [{ text: k.Text, score: k.Score ?? 0 }] : [],
      );
    } else {
      this.reportFailure('key_phrases', keyPhrases.reason);
    }

    if (entities.status === 'fulfilled') {
      analysis.entities = (entities.value.Entities ?? []).flatMap((e) =>
        e.Text !== undefined && e.Type !== undefined ? [{ type: e.Type, text: e.Text, score: e.Score ?? 0 }] : [],
      );
    } else {
      this.reportFailure('entities', entities.reason);
    }
    return analysis;
  }

  private reportFailure(part: 'sentiment' | 'key_phrases' | 'entities', reason: unknown) {
    analysisFailuresTotal.inc({ part });
    getLogger().warn({ part, error: errorName(reason) }, 'nlp-analysis-part-failed');
  }
}
