#!/usr/bin/env node
/**
 * AI Flaw Report CLI
 *
 * Runs form payloads through the report pipeline and browses the knowledge base.
 *
 * Usage:
 *   aifr process <file>      Validate, resolve and serialize a report payload
 *   aifr systems             List known AI system slugs
 *   aifr lookup <slug>       Show a system's linked data with its publisher
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigLoader, type ReportingConfig } from './config.js';
import { KnowledgeBaseIndex, KnowledgeBaseLoadError } from './knowledge-base/index.js';
import { ReportPipeline } from './reports/pipeline.js';
import { ResolutionError } from './reports/resolver.js';
import { UnknownSystemSlugError } from './reports/serializer.js';
import { ValidationError } from './reports/validator.js';

const VERSION = '0.1.0';

// ANSI colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function c(color: keyof typeof colors, text: string): string {
  return `${colors[color]}${text}${colors.reset}`;
}

function fail(message: string): never {
  console.error(c('red', `Error: ${message}`));
  process.exit(1);
}

function loadKnowledgeBase(config: ReportingConfig): KnowledgeBaseIndex {
  const index = KnowledgeBaseIndex.load(config.knowledgeBase.path);
  const { systems, organizations } = index.counts();
  console.error(c('dim', `Knowledge base: ${resolve(config.knowledgeBase.path)} (${systems} systems, ${organizations} organizations)`));
  return index;
}

function readPayload(filePath: string): unknown {
  const inputPath = resolve(filePath);
  if (!existsSync(inputPath)) {
    fail(`File does not exist: ${inputPath}`);
  }
  try {
    return JSON.parse(readFileSync(inputPath, 'utf-8'));
  } catch (err) {
    fail(`Could not parse ${inputPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

// ============ COMMANDS ============

function runProcess(args: string[], config: ReportingConfig): void {
  let inputFile: string | undefined;
  let outputFile: string | undefined;
  let showReport = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if ((arg === '-o' || arg === '--output') && args[i + 1]) {
      outputFile = args[++i];
    } else if (arg === '--report') {
      showReport = true;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    }
  }

  if (!inputFile) {
    fail('Usage: aifr process <file> [-o <output>] [--report]');
  }

  const payload = readPayload(inputFile);
  const pipeline = new ReportPipeline({
    knowledgeBase: loadKnowledgeBase(config),
    baseUri: config.reports.baseUri,
    strictMode: config.reports.strictOutput
  });

  const { report, document } = pipeline.process(payload);
  const indent = config.output.indent;

  console.error(c('green', `✓ Report ${report.reportId} processed (${report.aiSystems.length} system(s), severity ${report.flawSeverity})`));

  if (showReport) {
    console.log(JSON.stringify(report, null, indent));
  }

  const content = JSON.stringify(document, null, indent);
  if (outputFile) {
    const outputPath = resolve(outputFile);
    writeFileSync(outputPath, `${content}\n`);
    console.error(c('green', `✓ JSON-LD saved to: ${outputPath}`));
  } else {
    console.log(content);
  }
}

function runSystems(config: ReportingConfig): void {
  const listings = loadKnowledgeBase(config).listAllSystemSlugs();
  if (listings.length === 0) {
    console.log(c('yellow', 'No AI systems with slugs in the knowledge base.'));
    return;
  }

  const width = Math.max(...listings.map(listing => listing.slug.length));
  for (const { slug, displayName } of listings) {
    console.log(`  ${c('green', slug.padEnd(width))}  ${displayName}`);
  }
}

function runLookup(args: string[], config: ReportingConfig): void {
  const slug = args.find(arg => !arg.startsWith('-'));
  if (!slug) {
    fail('Usage: aifr lookup <slug>');
  }

  const linkedData = loadKnowledgeBase(config).getSystemLinkedData(slug);
  if (!linkedData) {
    fail(`No AI system with slug "${slug}"`);
  }
  console.log(JSON.stringify(linkedData, null, config.output.indent));
}

function showHelp(): void {
  console.log(`
${c('cyan', 'AI Flaw Report')} - Report validation and JSON-LD publishing
${c('dim', `Version ${VERSION}`)}

${c('bold', 'USAGE:')}
  aifr <command> [options]

${c('bold', 'COMMANDS:')}
  ${c('green', 'process')} <file>         Validate, resolve and serialize a report payload
  ${c('green', 'systems')}                List known AI system slugs
  ${c('green', 'lookup')} <slug>          Show a system's linked data with its publisher

${c('bold', 'OPTIONS:')}
  -o, --output      Save the JSON-LD document to a file
  --report          Also print the resolved report
  --kb <dir>        Knowledge base directory (default: knowledge-base)
  -h, --help        Show this help
  -v, --version     Show version

${c('bold', 'ENVIRONMENT:')}
  AIFR_KB_PATH          Knowledge base directory
  AIFR_BASE_URI         Base URI for report identifiers (default: https://aifr.org/reports)
  AIFR_STRICT_OUTPUT    Check documents against the output schema (default: true)
  AIFR_JSON_INDENT      JSON indentation (default: 2)
`);
}

function reportError(err: unknown): void {
  if (err instanceof ValidationError) {
    console.error(c('red', 'Report validation failed:'));
    for (const violation of err.violations) {
      console.error(`  - ${violation}`);
    }
  } else if (err instanceof ResolutionError || err instanceof UnknownSystemSlugError) {
    console.error(c('red', `${err.name}:`), err.message);
  } else if (err instanceof KnowledgeBaseLoadError) {
    console.error(c('red', 'Knowledge base could not be loaded:'), err.message);
  } else {
    console.error(c('red', 'Error:'), err instanceof Error ? err.message : String(err));
  }
}

function main(): void {
  const argv = process.argv.slice(2);

  // Handle flags
  if (argv.includes('--version') || argv.includes('-v')) {
    console.log(`aifr v${VERSION}`);
    process.exit(0);
  }

  const loader = new ConfigLoader();
  loader.autoLoad();

  const args: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--kb' && argv[i + 1]) {
      loader.getConfig().knowledgeBase.path = argv[++i];
    } else {
      args.push(argv[i]);
    }
  }

  const command = args[0];
  if (args.includes('--help') || args.includes('-h') || !command) {
    showHelp();
    process.exit(0);
  }

  const problems = loader.validate();
  if (problems.length > 0) {
    fail(`Invalid configuration: ${problems.join('; ')}`);
  }
  const config = loader.getConfig();

  switch (command) {
    case 'process':
      runProcess(args.slice(1), config);
      break;
    case 'systems':
      runSystems(config);
      break;
    case 'lookup':
      runLookup(args.slice(1), config);
      break;
    default:
      console.error(c('red', `Unknown command: ${command}`));
      console.log('Run aifr --help for usage information.');
      process.exit(1);
  }
}

try {
  main();
} catch (err) {
  reportError(err);
  process.exit(1);
}
