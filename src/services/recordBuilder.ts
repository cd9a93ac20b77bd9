import type { KeyObject } from 'crypto';
import type { AuditRecord, NlpAnalysis, PiiDetection, RedactionResult, TraceId, UnsignedRecord } from '../core/types.js';
import { computeRecordHash, sha256Hex } from '../utils/hashChain.js';
import { signHash } from '../utils/signing.js';
import { formatTraceId, formatUtcSeconds } from '../utils/traceId.js';

export interface RequestFields {
  method: string;
  model?: string;
  /** Raw prompt text; only its hash is recorded. */
  body: string;
  maskedBody?: string;
  piiDetection: PiiDetection;
  nlpAnalysis?: NlpAnalysis;
}

export interface ResponseFields {
  status: string;
  /** Raw response text; only its hash is recorded. */
  content: string;
  maskedContent?: string;
  piiDetection?: PiiDetection;
}

export interface ChainPosition {
  lastHash: string | null;
}

export function toPiiDetection(result: RedactionResult): PiiDetection {
  return {
    detectorUsed: result.detectorUsed,
    totalMasked: result.totalMasked,
    findings: result.findings,
    score: result.score,
    limitations: result.limitations,
    ...(result.degradedReason ? { degradedReason: result.degradedReason } : {}),
  };
}

export class AuditRecordBuilder {
  constructor(
    private readonly privateKey: KeyObject,
    private readonly now: () => Date = () => new Date(),
  ) {}

  build(traceId: TraceId, request: RequestFields, response: ResponseFields, chain: ChainPosition): AuditRecord {
    const unsigned: UnsignedRecord = {
      traceId: formatTraceId(traceId),
      timestamp: formatUtcSeconds(this.now()),
      request: {
        method: request.method,
        ...(request.model !== undefined ? { model: request.model } : {}),
        bodyHash: sha256Hex(request.body),
        ...(request.maskedBody !== undefined ? { maskedBody: request.maskedBody } : {}),
        piiDetection: request.piiDetection,
        ...(request.nlpAnalysis !== undefined ? { nlpAnalysis: request.nlpAnalysis } : {}),
      },
      response: {
        status: response.status,
        contentHash: sha256Hex(response.content),
        ...(response.maskedContent !== undefined ? { maskedContent: response.maskedContent } : {}),
        ...(response.piiDetection !== undefined ? { piiDetection: response.piiDetection } : {}),
      },
      prevHash: chain.lastHash,
    };
    const recordHash = computeRecordHash(unsigned);
    return { ...unsigned, recordHash, signature: signHash(recordHash, this.privateKey) };
  }
}
