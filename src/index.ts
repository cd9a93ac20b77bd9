export { loadConfig, type AppConfig } from './config/index.js';
export * from './core/errors.js';
export * from './core/types.js';
export { auditRecordSchema, TRACE_ID_PATTERN } from './core/schemas.js';
export * from './redaction/index.js';
export { AuditRecordBuilder, toPiiDetection, type RequestFields, type ResponseFields } from './services/recordBuilder.js';
export { AuditPipeline, recordLocator, type ExchangeInput, type RunInput } from './services/auditPipeline.js';
export { DeliveryEngine, type DeliveryReport, type DeliveryOutcome } from './services/deliveryEngine.js';
export { transition, backoffDelay, type DeliveryState, type RetryPolicy } from './services/deliveryStateMachine.js';
export { CloudWatchLogSink, classifySinkError, type LogSink, type CloudWatchLogsApi } from './services/logSink.js';
export { withScopedTempFile } from './services/tempWorkspace.js';
export { runAssistant, type AssistantResult } from './services/assistantRunner.js';
export { verifyStoredChain } from './services/chainAudit.js';
export { RecordRepository, type PurgeResult } from './repositories/recordRepository.js';
export { ChainStateRepository, type ChainState } from './repositories/chainStateRepository.js';
export { AcknowledgementLedger } from './repositories/ackLedger.js';
export { newTraceId, formatTraceId, parseTraceId } from './utils/traceId.js';
export { generateKeyPair, loadSigningKeys, loadPublicKey } from './utils/keys.js';
export { verifyRecord, verifyRecordChain, orderRecordsByChain } from './utils/chainIntegrity.js';
export { registry as metricsRegistry } from './metrics/index.js';
