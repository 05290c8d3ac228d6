// Report Resolver - turns a validated RawReport into an EnrichedReport

import { createHash } from 'crypto';
import type { KnowledgeBaseIndex } from '../knowledge-base/index.js';
import {
  UNKNOWN_SYSTEM_NAME,
  type EnrichedReport,
  type JsonValue,
  type KnowledgeBaseEntry,
  type KnownSystem,
  type RawReport,
  type ResolvedSystem,
  type UnknownSystem
} from '../types/reports.js';

export const DEFAULT_REPORT_BASE_URI = 'https://aifr.org/reports';
const REPORT_ID_LENGTH = 16;

export class ResolutionError extends Error {
  public readonly reportId: string;
  public readonly unresolvedSlugs: string[];

  constructor(reportId: string, unresolvedSlugs: string[]) {
    super(
      unresolvedSlugs.length > 0
        ? `Report ${reportId} has no resolvable AI systems (unresolved: ${unresolvedSlugs.join(', ')})`
        : `Report ${reportId} has no AI systems`
    );
    this.name = 'ResolutionError';
    this.reportId = reportId;
    this.unresolvedSlugs = unresolvedSlugs;
  }
}

export interface ResolveOptions {
  baseUri?: string;
  now?: () => Date;
  // Called for each known-system slug missing from the knowledge base
  onUnresolvedSlug?: (slug: string) => void;
}

/**
 * Stable content digest of a raw report: same content gives the same id in
 * every process. SHA-256 over a fixed-order JSON encoding, truncated to 16
 * hex characters.
 */
export function computeReportId(raw: RawReport): string {
  const canonical = JSON.stringify([
    raw.ai_systems,
    raw.ai_systems_unknown.map(system => system.description),
    raw.flaw_description,
    raw.flaw_severity
  ]);
  return createHash('sha256').update(canonical, 'utf8').digest('hex').slice(0, REPORT_ID_LENGTH);
}

function textField(value: JsonValue | undefined): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function toKnownSystem(entry: KnowledgeBaseEntry, requestedSlug: string): KnownSystem {
  const name = textField(entry.publicFields.name);
  return Object.freeze({
    kind: 'known',
    id: entry.id,
    name,
    version: textField(entry.publicFields.version),
    slug: entry.internal.slug ?? requestedSlug,
    displayName: entry.internal.displayName ?? name
  });
}

function toUnknownSystem(baseUri: string, reportId: string, position: number, description: string): UnknownSystem {
  return Object.freeze({
    kind: 'unknown',
    id: `${baseUri}/${reportId}/unknown-system-${position}`,
    displayName: UNKNOWN_SYSTEM_NAME,
    description
  });
}

function warnUnresolved(slug: string): void {
  console.warn(`[Resolver] Dropping unknown system slug: ${slug}`);
}

export function resolveReport(
  raw: RawReport,
  knowledgeBase: KnowledgeBaseIndex,
  options: ResolveOptions = {}
): EnrichedReport {
  const baseUri = options.baseUri ?? DEFAULT_REPORT_BASE_URI;
  const now = options.now ?? (() => new Date());
  const onUnresolvedSlug = options.onUnresolvedSlug ?? warnUnresolved;

  const reportId = computeReportId(raw);
  const aiSystems: ResolvedSystem[] = [];
  const unresolvedSlugs: string[] = [];

  // Stale slugs are dropped rather than failing the whole report
  for (const slug of raw.ai_systems) {
    const entry = knowledgeBase.findSystemBySlug(slug);
    if (!entry) {
      unresolvedSlugs.push(slug);
      onUnresolvedSlug(slug);
      continue;
    }
    aiSystems.push(toKnownSystem(entry, slug));
  }

  raw.ai_systems_unknown.forEach((system, index) => {
    aiSystems.push(toUnknownSystem(baseUri, reportId, index + 1, system.description));
  });

  if (aiSystems.length === 0) {
    throw new ResolutionError(reportId, unresolvedSlugs);
  }

  return Object.freeze({
    reportId,
    createdAt: now().toISOString(),
    aiSystems: Object.freeze(aiSystems),
    flawDescription: raw.flaw_description,
    flawSeverity: raw.flaw_severity
  });
}
