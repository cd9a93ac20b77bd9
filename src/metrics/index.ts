import { Counter, Histogram, Registry } from 'prom-client';
import fs from 'fs';
import path from 'path';

export const registry = new Registry();

export const piiFindingsTotal = new Counter({
  name: 'audit_pii_findings_total',
  help: 'PII spans masked, by category and detection tier',
  labelNames: ['category', 'detector'] as const,
  registers: [registry],
});

// Remote classifier unavailable / unsupported; local patterns took over
export const redactionDegradedTotal = new Counter({
  name: 'audit_redaction_degraded_total',
  help: 'Redactions that fell back to local patterns',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const analysisFailuresTotal = new Counter({
  name: 'audit_analysis_failures_total',
  help: 'Best-effort NLP analysis calls that failed',
  labelNames: ['part'] as const, // sentiment|key_phrases|entities
  registers: [registry],
});

export const recordsCreatedTotal = new Counter({
  name: 'audit_records_created_total',
  help: 'Signed audit records persisted to the pending area',
  registers: [registry],
});

export const deliveriesTotal = new Counter({
  name: 'audit_deliveries_total',
  help: 'Record delivery outcomes',
  labelNames: ['result'] as const, // succeeded|failed|skipped|acknowledged
  registers: [registry],
});

export const deliveryRetriesTotal = new Counter({
  name: 'audit_delivery_retries_total',
  help: 'Delivery attempts beyond the first, caused by throttling',
  registers: [registry],
});

export const deliveryBackoffMs = new Histogram({
  name: 'audit_delivery_backoff_ms',
  help: 'Backoff delay applied before a delivery retry (milliseconds)',
  buckets: [1, 10, 100, 500, 1000, 2000, 4000, 8000],
  registers: [registry],
});

export const processedPurgedTotal = new Counter({
  name: 'audit_processed_purged_total',
  help: 'Processed records removed by retention',
  labelNames: ['mode'] as const, // deleted|dry_run
  registers: [registry],
});

export const tempRestrictionFailuresTotal = new Counter({
  name: 'audit_temp_restriction_failures_total',
  help: 'Scoped temp files whose access could not be restricted to the owner',
  registers: [registry],
});

export const integrityVerificationsTotal = new Counter({
  name: 'audit_integrity_verifications_total',
  help: 'Audit chain integrity verifications',
  labelNames: ['result'] as const, // valid|invalid
  registers: [registry],
});

/** Writes the registry in Prometheus text format (node-exporter textfile collector). */
export async function writeMetricsTextfile(file: string): Promise<void> {
  const target = path.resolve(file);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  const tmp = `${target}.${process.pid}.tmp`;
  await fs.promises.writeFile(tmp, await registry.metrics());
  await fs.promises.rename(tmp, target);
}
