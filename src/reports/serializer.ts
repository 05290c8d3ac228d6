// JSON-LD Serializer - projects an EnrichedReport into the published linked-data document

import type { KnowledgeBaseIndex } from '../knowledge-base/index.js';
import type {
  EnrichedReport,
  JsonLdReport,
  JsonObject,
  ReportVocabulary,
  ResolvedSystem,
  UnknownSystemNode
} from '../types/reports.js';
import { DEFAULT_REPORT_BASE_URI } from './resolver.js';

export const SCHEMA_ORG_CONTEXT = 'https://schema.org/';
export const REPORT_NAME_PREFIX = 'AI Flaw Report: ';

const REPORT_VOCABULARY: ReportVocabulary = {
  aifr: 'urn:aifr:vocab:',
  aiSystem: 'aifr:aiSystem',
  severity: 'aifr:severity'
};

// The knowledge base changed between resolution and serialization
export class UnknownSystemSlugError extends Error {
  public readonly slug: string;

  constructor(slug: string) {
    super(`System slug '${slug}' not found in knowledge base`);
    this.name = 'UnknownSystemSlugError';
    this.slug = slug;
  }
}

export interface SerializeOptions {
  baseUri?: string;
}

function projectSystem(system: ResolvedSystem, knowledgeBase: KnowledgeBaseIndex): JsonObject | UnknownSystemNode {
  if (system.kind === 'unknown') {
    return {
      '@type': 'schema:SoftwareApplication',
      '@id': system.id,
      description: system.description
    };
  }

  const linkedData = knowledgeBase.getSystemLinkedData(system.slug);
  if (!linkedData) {
    throw new UnknownSystemSlugError(system.slug);
  }
  return linkedData;
}

export function serializeReport(
  report: EnrichedReport,
  knowledgeBase: KnowledgeBaseIndex,
  options: SerializeOptions = {}
): JsonLdReport {
  const baseUri = options.baseUri ?? DEFAULT_REPORT_BASE_URI;

  const aiSystem = report.aiSystems.map(system => projectSystem(system, knowledgeBase));
  const names = report.aiSystems.map(system => system.displayName);

  return {
    '@context': [SCHEMA_ORG_CONTEXT, { ...REPORT_VOCABULARY }],
    '@type': 'aifr:AIFlawReport',
    '@id': `${baseUri}/${report.reportId}`,
    name: `${REPORT_NAME_PREFIX}${names.join(', ')}`,
    description: report.flawDescription,
    aiSystem,
    severity: report.flawSeverity
  };
}
