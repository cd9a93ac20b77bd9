import type { AppConfig } from '../config/index.js';
import type { AuditRecord, RecordHandle, RedactionResult, TraceId } from '../core/types.js';
import { recordsCreatedTotal } from '../metrics/index.js';
import type { IPiiRedactor } from '../redaction/IPiiRedactor.js';
import type { IRemoteClassifier } from '../redaction/IRemoteClassifier.js';
import { createRedactor } from '../redaction/RedactorFactory.js';
import { ChainStateRepository } from '../repositories/chainStateRepository.js';
import { RecordRepository, recordFileName } from '../repositories/recordRepository.js';
import { loadSigningKeys } from '../utils/keys.js';
import { getLogger } from '../utils/logging.js';
import { newTraceId } from '../utils/traceId.js';
import { runAssistant, type AssistantResult } from './assistantRunner.js';
import type { ScopedTempOptions } from './tempWorkspace.js';
import { AuditRecordBuilder, toPiiDetection } from './recordBuilder.js';

export interface PipelineDeps {
  redactor: IPiiRedactor;
  builder: AuditRecordBuilder;
  records: RecordRepository;
  chain: ChainStateRepository;
  language: string;
  includeMaskedText: boolean;
  traceIds?: () => TraceId;
}

export interface ExchangeInput {
  method: string;
  model?: string;
  prompt: string;
  response: string;
  status: string;
}

export interface RunInput {
  method: string;
  model?: string;
  prompt: string;
  command: string;
  args?: string[];
  timeoutMs: number;
  temp?: ScopedTempOptions;
}

export interface RecordedExchange {
  record: AuditRecord;
  handle: RecordHandle;
}

/** Locates a record announced by a chain intent in either store area. */
export function recordLocator(records: RecordRepository) {
  return async (intent: { traceId: string; recordHash: string }): Promise<boolean> => {
    const handle = await records.locate(recordFileName(intent.traceId));
    if (!handle) return false;
    try {
      return (await records.read(handle)).recordHash === intent.recordHash;
    } catch {
      return false;
    }
  };
}

/** trace id → redaction → analysis → signed record appended under the chain lock. */
export class AuditPipeline {
  private readonly traceIds: () => TraceId;

  constructor(private readonly deps: PipelineDeps) {
    this.traceIds = deps.traceIds ?? (() => newTraceId());
  }

  static fromConfig(cfg: AppConfig, opts: { classifier?: IRemoteClassifier; useRemote?: boolean } = {}): AuditPipeline {
    const { privateKey } = loadSigningKeys(cfg.storage.keyDir);
    const records = new RecordRepository(cfg.storage.logDir);
    return new AuditPipeline({
      redactor: createRedactor(opts.useRemote ?? cfg.redaction.useRemote, opts.classifier, cfg),
      builder: new AuditRecordBuilder(privateKey),
      records,
      chain: new ChainStateRepository(cfg.storage.logDir, recordLocator(records)),
      language: cfg.redaction.language,
      includeMaskedText: cfg.record.includeMaskedText,
    });
  }

  async recordExchange(input: ExchangeInput): Promise<RecordedExchange> {
    const traceId = this.traceIds();
    const promptMask = await this.deps.redactor.mask(input.prompt, this.deps.language);
    return this.append(traceId, input, promptMask);
  }

  /** Masks the prompt, runs the assistant on the masked text and records the exchange. */
  async runAndRecord(input: RunInput): Promise<RecordedExchange & { result: AssistantResult }> {
    const traceId = this.traceIds();
    const promptMask = await this.deps.redactor.mask(input.prompt, this.deps.language);
    const result = await runAssistant({
      command: input.command,
      args: input.args,
      prompt: promptMask.maskedText,
      timeoutMs: input.timeoutMs,
      temp: input.temp,
    });
    const status = result.timedOut ? 'timeout' : result.exitCode === 0 ? 'success' : `error:${result.exitCode}`;
    const recorded = await this.append(
      traceId,
      { method: input.method, model: input.model, prompt: input.prompt, response: result.stdout, status },
      promptMask,
    );
    return { ...recorded, result };
  }

  private async append(traceId: TraceId, input: ExchangeInput, promptMask: RedactionResult): Promise<RecordedExchange> {
    const { redactor, language, includeMaskedText } = this.deps;
    const responseMask = await redactor.mask(input.response, language);
    // analysis only ever sees masked text
    const nlpAnalysis = await redactor.analyze(promptMask.maskedText, language);

    const { record, stored } = await this.deps.chain.append(
      (lastHash) =>
        this.deps.builder.build(
          traceId,
          {
            method: input.method,
            model: input.model,
            body: input.prompt,
            maskedBody: includeMaskedText ? promptMask.maskedText : undefined,
            piiDetection: toPiiDetection(promptMask),
            nlpAnalysis,
          },
          {
            status: input.status,
            content: input.response,
            maskedContent: includeMaskedText ? responseMask.maskedText : undefined,
            piiDetection: toPiiDetection(responseMask),
          },
          { lastHash },
        ),
      (r) => this.deps.records.persist(r),
    );
    recordsCreatedTotal.inc();
    getLogger().info(
      {
        traceId: record.traceId,
        recordHash: record.recordHash,
        promptMasked: promptMask.totalMasked,
        responseMasked: responseMask.totalMasked,
        detector: promptMask.detectorUsed,
      },
      'audit-record-created',
    );
    return { record, handle: stored };
  }
}
