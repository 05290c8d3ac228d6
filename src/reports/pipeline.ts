// Report Pipeline - validate, resolve, serialize with fail-closed output checks

import type { KnowledgeBaseIndex } from '../knowledge-base/index.js';
import type { EnrichedReport, JsonLdReport, RawReport } from '../types/reports.js';
import { ReportValidator } from './validator.js';
import { DEFAULT_REPORT_BASE_URI, resolveReport } from './resolver.js';
import { serializeReport } from './serializer.js';

export interface PipelineConfig {
  knowledgeBase: KnowledgeBaseIndex;
  baseUri?: string;
  strictMode?: boolean;
  clock?: () => Date;
  onUnresolvedSlug?: (slug: string) => void;
}

export interface ProcessedReport {
  raw: RawReport;
  report: EnrichedReport;
  document: JsonLdReport;
}

export class ReportPipeline {
  private validator: ReportValidator;
  private knowledgeBase: KnowledgeBaseIndex;
  private baseUri: string;
  private strictMode: boolean;
  private clock: () => Date;
  private onUnresolvedSlug?: (slug: string) => void;

  constructor(config: PipelineConfig) {
    this.validator = new ReportValidator();
    this.knowledgeBase = config.knowledgeBase;
    this.baseUri = config.baseUri ?? DEFAULT_REPORT_BASE_URI;
    this.strictMode = config.strictMode ?? true;
    this.clock = config.clock ?? (() => new Date());
    this.onUnresolvedSlug = config.onUnresolvedSlug;
  }

  // Main entry point - both stages run against the same index snapshot
  process(rawInput: unknown): ProcessedReport {
    const knowledgeBase = this.knowledgeBase;

    const raw = this.validator.validate(rawInput);
    const report = this.resolveWith(raw, knowledgeBase);
    const document = this.serializeWith(report, knowledgeBase);

    return { raw, report, document };
  }

  validate(rawInput: unknown): RawReport {
    return this.validator.validate(rawInput);
  }

  resolve(raw: RawReport): EnrichedReport {
    return this.resolveWith(raw, this.knowledgeBase);
  }

  serialize(report: EnrichedReport): JsonLdReport {
    return this.serializeWith(report, this.knowledgeBase);
  }

  // Copy-on-write reload: callers build a complete new index and swap it in
  swapKnowledgeBase(next: KnowledgeBaseIndex): KnowledgeBaseIndex {
    const previous = this.knowledgeBase;
    this.knowledgeBase = next;
    return previous;
  }

  getKnowledgeBase(): KnowledgeBaseIndex {
    return this.knowledgeBase;
  }

  private resolveWith(raw: RawReport, knowledgeBase: KnowledgeBaseIndex): EnrichedReport {
    return resolveReport(raw, knowledgeBase, {
      baseUri: this.baseUri,
      now: this.clock,
      onUnresolvedSlug: this.onUnresolvedSlug
    });
  }

  private serializeWith(report: EnrichedReport, knowledgeBase: KnowledgeBaseIndex): JsonLdReport {
    const document = serializeReport(report, knowledgeBase, { baseUri: this.baseUri });

    // Fail-closed: never hand out a document that breaks the published shape
    if (this.strictMode) {
      this.validator.assertValidOutput(document);
    }
    return document;
  }
}
