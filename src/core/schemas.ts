import { z } from 'zod';

export const TRACE_ID_PATTERN =
  /^([0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}):(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z)$/;

export const detectorSchema = z.enum(['local_pattern', 'remote_classifier']);

export const findingSchema = z.object({
  category: z.string().min(1),
  originalSpanHash: z.string().regex(/^[0-9a-f]{64}$/),
  maskingMethod: z.literal('placeholder'),
  detector: detectorSchema,
}).strict();

export const piiDetectionSchema = z.object({
  detectorUsed: detectorSchema,
  totalMasked: z.number().int().nonnegative(),
  findings: z.array(findingSchema),
  score: z.number().min(0).max(1),
  limitations: z.array(z.string()),
  degradedReason: z.enum(['unsupported_language', 'timeout', 'unavailable']).optional(),
}).strict();

export const nlpAnalysisSchema = z.object({
  sentiment: z
    .object({
      label: z.string(),
      scores: z
        .object({
          positive: z.number(),
          negative: z.number(),
          neutral: z.number(),
          mixed: z.number(),
        })
        .strict(),
    })
    .strict()
    .optional(),
  keyPhrases: z.array(z.object({ text: z.string(), score: z.number() }).strict()).optional(),
  entities: z
    .array(z.object({ type: z.string(), text: z.string(), score: z.number() }).strict())
    .optional(),
}).strict();

const sha256Hex = z.string().regex(/^[0-9a-f]{64}$/);

// Stored records are hashed as read; unknown keys must fail rather than be stripped
export const auditRecordSchema = z.object({
  traceId: z.string().regex(TRACE_ID_PATTERN),
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/),
  request: z.object({
    method: z.string().min(1),
    model: z.string().optional(),
    bodyHash: sha256Hex,
    maskedBody: z.string().optional(),
    piiDetection: piiDetectionSchema,
    nlpAnalysis: nlpAnalysisSchema.optional(),
  }).strict(),
  response: z.object({
    status: z.string().min(1),
    contentHash: sha256Hex,
    maskedContent: z.string().optional(),
    piiDetection: piiDetectionSchema.optional(),
  }).strict(),
  prevHash: sha256Hex.nullable(),
  recordHash: sha256Hex,
  signature: z.string().regex(/^[0-9a-f]+$/),
}).strict();

export type Finding = z.infer<typeof findingSchema>;
export type PiiDetection = z.infer<typeof piiDetectionSchema>;
export type NlpAnalysis = z.infer<typeof nlpAnalysisSchema>;
export type AuditRecord = z.infer<typeof auditRecordSchema>;
export type UnsignedRecord = Omit<AuditRecord, 'recordHash' | 'signature'>;
