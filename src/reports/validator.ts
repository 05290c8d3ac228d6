// Report Validator - strict validation of form input and published output

import type { ValidateFunction } from 'ajv';
import { createAjv, formatSchemaError } from '../schemas/ajv.js';
import { reportInputSchema } from '../schemas/input.schema.js';
import { reportOutputSchema } from '../schemas/output.schema.js';
import type { JsonLdReport, RawReport, RawReportPayload } from '../types/reports.js';

const NO_SYSTEMS_MESSAGE = 'Must specify at least one AI system (known or unknown)';

export class ValidationError extends Error {
  public readonly violations: string[];

  constructor(message: string, violations: string[]) {
    super(violations.length > 0 ? `${message}: ${violations.join('; ')}` : message);
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export class ReportValidator {
  private validateInput: ValidateFunction<RawReportPayload>;
  private validateOutput: ValidateFunction<JsonLdReport>;

  constructor() {
    const ajv = createAjv();
    this.validateInput = ajv.compile<RawReportPayload>(reportInputSchema);
    this.validateOutput = ajv.compile<JsonLdReport>(reportOutputSchema);
  }

  /**
   * Validates a raw form payload and returns it as a frozen RawReport.
   *
   * Field-level rules (description length, severity, system entries) always run
   * before the cross-field "at least one system" rule, and every violation is
   * reported together.
   */
  validate(input: unknown): RawReport {
    const { payload, violations } = this.check(input);
    if (!payload) {
      throw new ValidationError('Report validation failed', violations);
    }

    return Object.freeze({
      ai_systems: Object.freeze([...(payload.ai_systems ?? [])]),
      ai_systems_unknown: Object.freeze(
        (payload.ai_systems_unknown ?? []).map(system => Object.freeze({ description: system.description }))
      ),
      flaw_description: payload.flaw_description,
      flaw_severity: payload.flaw_severity
    });
  }

  getInputViolations(input: unknown): string[] {
    return this.check(input).violations;
  }

  // Fail-closed: throws on a document that does not match the published shape
  assertValidOutput(data: unknown): asserts data is JsonLdReport {
    if (!this.validateOutput(data)) {
      throw new ValidationError(
        'Output validation failed',
        (this.validateOutput.errors ?? []).map(err => formatSchemaError(err, 'document'))
      );
    }
  }

  isValidOutput(data: unknown): data is JsonLdReport {
    return this.validateOutput(data);
  }

  private check(input: unknown): { payload: RawReportPayload | null; violations: string[] } {
    if (!this.validateInput(input)) {
      const violations = (this.validateInput.errors ?? []).map(err => formatSchemaError(err, 'report'));
      if (isRecord(input) && hasNoSystems(input.ai_systems, input.ai_systems_unknown)) {
        violations.push(NO_SYSTEMS_MESSAGE);
      }
      return { payload: null, violations };
    }

    if (countSystems(input.ai_systems, input.ai_systems_unknown) === 0) {
      return { payload: null, violations: [NO_SYSTEMS_MESSAGE] };
    }
    return { payload: input, violations: [] };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function countSystems(known: unknown, described: unknown): number {
  return (Array.isArray(known) ? known.length : 0) + (Array.isArray(described) ? described.length : 0);
}

// A list of the wrong type already has its own violation
function hasNoSystems(known: unknown, described: unknown): boolean {
  const listOrAbsent = (value: unknown) => value === undefined || Array.isArray(value);
  return listOrAbsent(known) && listOrAbsent(described) && countSystems(known, described) === 0;
}
