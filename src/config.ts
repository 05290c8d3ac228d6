// Configuration System - Load and validate report pipeline configuration
// Supports: JSON config files and environment variables

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { DEFAULT_REPORT_BASE_URI } from './reports/resolver.js';

export interface ReportingConfig {
  knowledgeBase: {
    path: string;
  };
  reports: {
    baseUri: string;
    strictOutput: boolean;
  };
  output: {
    indent: number;
  };
}

export interface PartialReportingConfig {
  knowledgeBase?: Partial<ReportingConfig['knowledgeBase']>;
  reports?: Partial<ReportingConfig['reports']>;
  output?: Partial<ReportingConfig['output']>;
}

export const CONFIG_FILES = ['aifr.config.json', '.aifrrc.json'];

function defaultConfig(): ReportingConfig {
  return {
    knowledgeBase: { path: 'knowledge-base' },
    reports: { baseUri: DEFAULT_REPORT_BASE_URI, strictOutput: true },
    output: { indent: 2 }
  };
}

function trimTrailingSlash(uri: string): string {
  return uri.replace(/\/+$/, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return undefined;
}

// Keeps only the known keys with the expected primitive types
function readPartialConfig(parsed: unknown): PartialReportingConfig {
  const result: PartialReportingConfig = {};
  if (!isRecord(parsed)) return result;

  const { knowledgeBase, reports, output } = parsed;
  if (isRecord(knowledgeBase) && typeof knowledgeBase.path === 'string') {
    result.knowledgeBase = { path: knowledgeBase.path };
  }
  if (isRecord(reports)) {
    result.reports = {};
    if (typeof reports.baseUri === 'string') result.reports.baseUri = reports.baseUri;
    if (typeof reports.strictOutput === 'boolean') result.reports.strictOutput = reports.strictOutput;
  }
  if (isRecord(output) && typeof output.indent === 'number') {
    result.output = { indent: output.indent };
  }
  return result;
}

export class ConfigLoader {
  private config: ReportingConfig;

  constructor() {
    this.config = defaultConfig();
  }

  // Load from file
  loadFromFile(filePath: string): ReportingConfig {
    if (!existsSync(filePath)) {
      console.warn(`[Config] File not found: ${filePath}, using defaults`);
      return this.config;
    }

    const ext = filePath.split('.').pop()?.toLowerCase();
    if (ext !== 'json') {
      throw new Error(`Unsupported config format: ${ext ?? filePath}`);
    }

    const content = readFileSync(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid JSON in config file ${filePath}: ${reason}`);
    }

    this.config = this.mergeConfig(this.config, readPartialConfig(parsed));
    return this.config;
  }

  // Load from environment variables
  loadFromEnv(env: NodeJS.ProcessEnv = process.env): ReportingConfig {
    if (env.AIFR_KB_PATH) {
      this.config.knowledgeBase.path = env.AIFR_KB_PATH;
    }
    if (env.AIFR_BASE_URI) {
      this.config.reports.baseUri = trimTrailingSlash(env.AIFR_BASE_URI);
    }
    if (env.AIFR_STRICT_OUTPUT) {
      const strict = parseBoolean(env.AIFR_STRICT_OUTPUT);
      if (strict === undefined) {
        console.warn(`[Config] Ignoring AIFR_STRICT_OUTPUT=${env.AIFR_STRICT_OUTPUT} (expected true/false)`);
      } else {
        this.config.reports.strictOutput = strict;
      }
    }
    if (env.AIFR_JSON_INDENT) {
      this.config.output.indent = parseInt(env.AIFR_JSON_INDENT, 10);
    }

    return this.config;
  }

  // Auto-detect and load config
  autoLoad(basePath: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): ReportingConfig {
    for (const file of CONFIG_FILES) {
      const fullPath = join(basePath, file);
      if (existsSync(fullPath)) {
        console.warn(`[Config] Loading from ${file}`);
        this.loadFromFile(fullPath);
        break;
      }
    }

    // Override with env vars
    this.loadFromEnv(env);

    return this.config;
  }

  getConfig(): ReportingConfig {
    return this.config;
  }

  // Validate configuration
  validate(): string[] {
    const errors: string[] = [];

    if (!this.config.knowledgeBase.path.trim()) {
      errors.push('knowledgeBase.path is required');
    }
    if (!/^https?:\/\/[^\s/]+/.test(this.config.reports.baseUri)) {
      errors.push('reports.baseUri must be an http(s) URL');
    }
    const indent = this.config.output.indent;
    if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
      errors.push('output.indent must be an integer between 0 and 10');
    }

    return errors;
  }

  private mergeConfig(base: ReportingConfig, override: PartialReportingConfig): ReportingConfig {
    const merged: ReportingConfig = {
      knowledgeBase: { ...base.knowledgeBase, ...override.knowledgeBase },
      reports: { ...base.reports, ...override.reports },
      output: { ...base.output, ...override.output }
    };
    merged.reports.baseUri = trimTrailingSlash(merged.reports.baseUri);
    return merged;
  }
}
