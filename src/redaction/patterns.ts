/**
 * Local PII pattern tier. Runs on every redaction, including when the remote
 * classifier succeeds, since locale identifiers (JP phone numbers, My Number,
 * postal codes) are outside the remote classifier's entity set.
 */

import { sha256Hex } from '../utils/hashChain.js';
import type { DetectorKind, Finding } from '../core/types.js';

export interface PiiPattern {
  category: string;
  regex: RegExp;
}

// Order doubles as priority when two equally long candidates overlap
export const PII_PATTERNS: readonly PiiPattern[] = [
  { category: 'email', regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
  { category: 'credit_card', regex: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g },
  { category: 'my_number', regex: /\b\d{4}-?\d{4}-?\d{4}\b/g },
  { category: 'phone_intl', regex: /\+81[-\s]?\d{1,4}[-\s]?\d{1,4}[-\s]?\d{4}\b/g },
  { category: 'phone_jp', regex: /\b0\d{1,4}-?\d{1,4}-?\d{4}\b/g },
  { category: 'ssn', regex: /\b\d{3}-\d{2}-\d{4}\b/g },
  { category: 'zip_code_jp', regex: /\b\d{3}-\d{4}\b/g },
  { category: 'ipv4', regex: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g },
];

export const LOCAL_LIMITATIONS = [
  'no checksum validation on structured numeric identifiers',
  'no coverage of free-form narrative PII (names, addresses in prose)',
  'no image content',
];

export const REMOTE_LIMITATIONS = [
  'no checksum validation on structured numeric identifiers',
  'no image content',
];

export interface Span {
  start: number;
  end: number;
  category: string;
  detector: DetectorKind;
  priority: number;
}

export function placeholderFor(category: string): string {
  return `[MASKED_${category.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}]`;
}

export function detectLocalSpans(text: string): Span[] {
  const spans: Span[] = [];
  PII_PATTERNS.forEach((pattern, priority) => {
    for (const match of text.matchAll(pattern.regex)) {
      const start = match.index ?? 0;
      spans.push({
        start,
        end: start + match[0].length,
        category: pattern.category,
        detector: 'local_pattern',
        priority,
      });
    }
  });
  return spans;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Adds `candidates` to `accepted` wherever they do not overlap an accepted span.
 * Among candidates the longest wins, then the lower priority index, then the earlier one.
 */
export function mergeSpans(accepted: Span[], candidates: Span[]): Span[] {
  const result = accepted.slice();
  const ranked = candidates
    .slice()
    .sort((a, b) => b.end - b.start - (a.end - a.start) || a.priority - b.priority || a.start - b.start);
  for (const span of ranked) {
    if (!result.some((r) => overlaps(r, span))) result.push(span);
  }
  return result.sort((a, b) => a.start - b.start);
}

export function applySpans(text: string, spans: Span[]): { maskedText: string; findings: Finding[] } {
  const ordered = spans.slice().sort((a, b) => a.start - b.start);
  const findings: Finding[] = [];
  let out = '';
  let cursor = 0;
  for (const span of ordered) {
    out += text.slice(cursor, span.start) + placeholderFor(span.category);
    findings.push({
      category: span.category,
      originalSpanHash: sha256Hex(text.slice(span.start, span.end)),
      maskingMethod: 'placeholder',
      detector: span.detector,
    });
    cursor = span.end;
  }
  out += text.slice(cursor);
  return { maskedText: out, findings };
}

const MAX_RESCAN_PASSES = 3;

/**
 * Masks the given (already resolved) spans plus every local pattern match, then
 * re-scans the output so no local pattern survives a substitution.
 */
export function maskText(
  text: string,
  preferred: Span[] = [],
): { maskedText: string; findings: Finding[]; maskedChars: number } {
  const spans = mergeSpans(mergeSpans([], preferred), detectLocalSpans(text));
  let maskedChars = spans.reduce((sum, s) => sum + (s.end - s.start), 0);
  let { maskedText, findings } = applySpans(text, spans);
  for (let pass = 0; pass < MAX_RESCAN_PASSES; pass++) {
    const residual = mergeSpans([], detectLocalSpans(maskedText));
    if (residual.length === 0) break;
    maskedChars += residual.reduce((sum, s) => sum + (s.end - s.start), 0);
    const next = applySpans(maskedText, residual);
    maskedText = next.maskedText;
    findings = findings.concat(next.findings);
  }
  return { maskedText, findings, maskedChars };
}

/** Share of the input covered by PII, 0..1 rounded to two decimals. */
export function piiScore(textLength: number, maskedChars: number): number {
  if (textLength === 0) return 0;
  return Math.round(Math.min(maskedChars / textLength, 1) * 100) / 100;
}
