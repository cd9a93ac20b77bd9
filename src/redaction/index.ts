/**
 * PII redaction - local pattern tier plus an optional remote classifier tier.
 * Add a classifier by implementing IRemoteClassifier and passing it to createRedactor.
 */

export type { IPiiRedactor } from './IPiiRedactor.js';
export type { IRemoteClassifier, RemotePiiEntity } from './IRemoteClassifier.js';
export { LocalPatternRedactor } from './LocalPatternRedactor.js';
export { RemoteAugmentedRedactor, type RemoteRedactionOptions } from './RemoteAugmentedRedactor.js';
export { ComprehendClassifier, comprehendApi, type ComprehendApi } from './ComprehendClassifier.js';
export { createRedactor, mask, type RedactionSettings } from './RedactorFactory.js';
export { PII_PATTERNS, placeholderFor } from './patterns.js';
