import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  storage: z.object({
    logDir: z.string().min(1),
    keyDir: z.string().min(1),
  }),
  redaction: z.object({
    useRemote: z.boolean().default(false),
    language: z.string().min(2).default('ja'),
    confidenceThreshold: z.number().min(0).max(1).default(0.7),
    timeoutMs: z.number().int().positive().default(5000),
    // Comprehend rejects PII requests above 100KB of UTF-8
    maxRemoteBytes: z.number().int().positive().default(100_000),
  }),
  aws: z.object({
    region: z.string().min(1).default('ap-northeast-1'),
  }),
  sink: z.object({
    logGroup: z.string().min(1),
    logStream: z.string().min(1),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  delivery: z.object({
    maxAttempts: z.number().int().positive().default(3),
    backoffUnitMs: z.number().int().nonnegative().default(1000),
    pacingMs: z.number().int().nonnegative().default(200),
    retentionDays: z.number().int().positive().default(7),
  }),
  record: z.object({
    includeMaskedText: z.boolean().default(true),
  }),
  assistant: z.object({
    timeoutMs: z.number().int().positive().default(300_000),
  }),
  metrics: z.object({
    textfile: z.string().optional(),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function envInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function loadConfig(configPath = 'audit.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!isRecord(parsed)) {
      throw new Error(`Config file ${full} must contain a JSON object`);
    }
    fileRaw = parsed;
  }
  const env = process.env;
  const merged = {
    storage: {
      logDir: env.AUDIT_LOG_DIR || './logs',
      keyDir: env.AUDIT_KEY_DIR || './keys',
      ...section(fileRaw, 'storage'),
    },
    redaction: {
      ...defined({
        useRemote: envBool(env.AUDIT_USE_REMOTE_PII),
        language: env.AUDIT_LANGUAGE || undefined,
      }),
      ...section(fileRaw, 'redaction'),
    },
    aws: {
      ...defined({ region: env.AWS_REGION || undefined }),
      ...section(fileRaw, 'aws'),
    },
    sink: {
      logGroup: env.AUDIT_LOG_GROUP || '/ai-audit/exchanges',
      logStream: env.AUDIT_LOG_STREAM || 'default',
      ...section(fileRaw, 'sink'),
    },
    delivery: {
      ...defined({ retentionDays: envInt(env.AUDIT_RETENTION_DAYS) }),
      ...section(fileRaw, 'delivery'),
    },
    record: { ...section(fileRaw, 'record') },
    assistant: { ...section(fileRaw, 'assistant') },
    metrics: {
      ...defined({ textfile: env.AUDIT_METRICS_TEXTFILE || undefined }),
      ...section(fileRaw, 'metrics'),
    },
    logging: { level: env.LOG_LEVEL || 'info', json: true, ...section(fileRaw, 'logging') },
  };
  return ConfigSchema.parse(merged);
}
