// AI Flaw Report - public API
// Raw form payload -> validated report -> resolved report -> JSON-LD document

export {
  KnowledgeBaseIndex,
  KnowledgeBaseLoadError,
  SYSTEMS_FILE,
  ORGANIZATIONS_FILE
} from './knowledge-base/index.js';
export { ReportValidator, ValidationError } from './reports/validator.js';
export {
  resolveReport,
  computeReportId,
  ResolutionError,
  DEFAULT_REPORT_BASE_URI,
  type ResolveOptions
} from './reports/resolver.js';
export {
  serializeReport,
  UnknownSystemSlugError,
  SCHEMA_ORG_CONTEXT,
  type SerializeOptions
} from './reports/serializer.js';
export { ReportPipeline, type PipelineConfig, type ProcessedReport } from './reports/pipeline.js';
export { ConfigLoader, CONFIG_FILES, type ReportingConfig } from './config.js';
export { reportInputSchema, MIN_FLAW_DESCRIPTION_LENGTH } from './schemas/input.schema.js';
export { reportOutputSchema } from './schemas/output.schema.js';
export * from './types/reports.js';
