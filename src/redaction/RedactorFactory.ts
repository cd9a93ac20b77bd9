import type { AppConfig } from '../config/index.js';
import type { RedactionResult } from '../core/types.js';
import { ComprehendClassifier } from './ComprehendClassifier.js';
import type { IPiiRedactor } from './IPiiRedactor.js';
import type { IRemoteClassifier } from './IRemoteClassifier.js';
import { LocalPatternRedactor } from './LocalPatternRedactor.js';
import { RemoteAugmentedRedactor } from './RemoteAugmentedRedactor.js';

export type RedactionSettings = Pick<AppConfig, 'redaction' | 'aws'>;

const DEFAULT_SETTINGS: RedactionSettings = {
  redaction: {
    useRemote: false,
    language: 'ja',
    confidenceThreshold: 0.7,
    timeoutMs: 5000,
    maxRemoteBytes: 100_000,
  },
  aws: { region: 'ap-northeast-1' },
};

/**
 * Picks the redaction variant. The remote classifier is only built when asked
 * for, so local-only runs never touch AWS configuration.
 */
export function createRedactor(
  useRemote: boolean,
  classifier?: IRemoteClassifier,
  settings: RedactionSettings = DEFAULT_SETTINGS,
): IPiiRedactor {
  if (!useRemote) return new LocalPatternRedactor();
  const remote =
    classifier ??
    new ComprehendClassifier({ region: settings.aws.region, timeoutMs: settings.redaction.timeoutMs });
  return new RemoteAugmentedRedactor(remote, {
    confidenceThreshold: settings.redaction.confidenceThreshold,
    timeoutMs: settings.redaction.timeoutMs,
    maxRemoteBytes: settings.redaction.maxRemoteBytes,
  });
}

export function mask(
  text: string,
  language: string,
  useRemote: boolean,
  classifier?: IRemoteClassifier,
): Promise<RedactionResult> {
  return createRedactor(useRemote, classifier).mask(text, language);
}
