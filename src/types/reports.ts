// AI Flaw Report types - wire payloads, knowledge base entries, resolved reports

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const SEVERITIES = ['Low', 'Medium', 'High', 'Critical'] as const;
export type Severity = typeof SEVERITIES[number];

export const UNKNOWN_SYSTEM_NAME = 'Unknown System';

// ============ KNOWLEDGE BASE ============

export type EntryKind = 'system' | 'organization';

export interface InternalMetadata {
  slug?: string;
  displayName?: string;
}

export interface KnowledgeBaseEntry {
  id: string;
  kind: EntryKind;
  // Everything published as linked data; internal fields are split off at load time
  publicFields: Readonly<JsonObject>;
  internal: Readonly<InternalMetadata>;
}

export interface CollectionDocument {
  '@context'?: JsonValue;
  '@graph': JsonObject[];
}

export interface SystemListing {
  slug: string;
  displayName: string;
}

// ============ RAW INPUT ============

export interface UnknownSystemInput {
  description: string;
}

export interface RawReportPayload {
  ai_systems?: string[];
  ai_systems_unknown?: UnknownSystemInput[];
  flaw_description: string;
  flaw_severity: Severity;
}

export interface RawReport {
  readonly ai_systems: readonly string[];
  readonly ai_systems_unknown: readonly Readonly<UnknownSystemInput>[];
  readonly flaw_description: string;
  readonly flaw_severity: Severity;
}

// ============ RESOLVED REPORT ============

export interface KnownSystem {
  readonly kind: 'known';
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly slug: string;
  readonly displayName: string;
}

export interface UnknownSystem {
  readonly kind: 'unknown';
  readonly id: string;
  readonly displayName: typeof UNKNOWN_SYSTEM_NAME;
  readonly description: string;
}

export type ResolvedSystem = KnownSystem | UnknownSystem;

export interface EnrichedReport {
  readonly reportId: string;
  readonly createdAt: string;
  readonly aiSystems: readonly ResolvedSystem[];
  readonly flawDescription: string;
  readonly flawSeverity: Severity;
}

// ============ JSON-LD OUTPUT ============

export interface ReportVocabulary {
  aifr: 'urn:aifr:vocab:';
  aiSystem: 'aifr:aiSystem';
  severity: 'aifr:severity';
}

export interface UnknownSystemNode {
  '@type': 'schema:SoftwareApplication';
  '@id': string;
  description: string;
}

export interface JsonLdReport {
  '@context': ['https://schema.org/', ReportVocabulary];
  '@type': 'aifr:AIFlawReport';
  '@id': string;
  name: string;
  description: string;
  aiSystem: Array<JsonObject | UnknownSystemNode>;
  severity: Severity;
}
