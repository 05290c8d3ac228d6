// Shared knowledge base and report fixtures for tests

import { KnowledgeBaseIndex } from '../knowledge-base/index.js';
import type { JsonObject, RawReport, RawReportPayload } from '../types/reports.js';

export const ACME_ORG: JsonObject = {
  '@type': 'Organization',
  '@id': 'https://example.org/orgs/acme',
  name: 'Acme Labs',
  url: 'https://example.org/',
  _aifr_internal: { slug: 'acme', displayName: 'Acme Labs' }
};

export const GPT_X_SYSTEM: JsonObject = {
  '@type': 'SoftwareApplication',
  '@id': 'https://example.org/systems/gpt-x',
  name: 'GPT-X',
  version: '1.0',
  publisher: { '@id': 'https://example.org/orgs/acme' },
  _aifr_internal: { slug: 'gpt-x', displayName: 'Acme GPT-X' }
};

// Numeric version, publisher missing from the organizations collection, extra internal field
export const ORBIT_SYSTEM: JsonObject = {
  '@type': 'SoftwareApplication',
  '@id': 'https://example.org/systems/orbit',
  name: 'Orbit',
  version: 2,
  publisher: { '@id': 'https://example.org/orgs/unlisted' },
  _review_notes: 'pending legal review',
  _aifr_internal: { slug: 'orbit', displayName: 'orbit assistant' }
};

// No internal record at all
export const PLAIN_SYSTEM: JsonObject = {
  '@type': 'SoftwareApplication',
  '@id': 'https://example.org/systems/plain',
  name: 'Plain'
};

export function collection(entries: JsonObject[]): JsonObject {
  return { '@context': 'https://schema.org/', '@graph': entries };
}

export function createKnowledgeBase(
  options: { systems?: JsonObject[]; organizations?: JsonObject[] } = {}
): KnowledgeBaseIndex {
  return KnowledgeBaseIndex.fromDocuments(
    collection(options.systems ?? [GPT_X_SYSTEM, ORBIT_SYSTEM, PLAIN_SYSTEM]),
    collection(options.organizations ?? [ACME_ORG])
  );
}

export function createPayload(overrides: Partial<RawReportPayload> = {}): RawReportPayload {
  return {
    ai_systems: ['gpt-x'],
    ai_systems_unknown: [],
    flaw_description: 'Model hallucinated a citation',
    flaw_severity: 'High',
    ...overrides
  };
}

export function createRawReport(overrides: Partial<RawReport> = {}): RawReport {
  return {
    ai_systems: ['gpt-x'],
    ai_systems_unknown: [],
    flaw_description: 'Model hallucinated a citation',
    flaw_severity: 'High',
    ...overrides
  };
}
