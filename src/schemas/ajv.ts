// Shared ajv setup and human-readable error formatting

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject } from 'ajv';

// Handle ESM/CJS interop
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export type SchemaCompiler = InstanceType<typeof Ajv>;

export function createAjv(): SchemaCompiler {
  const ajv = new Ajv({
    strict: true,
    allErrors: true,
    verbose: true
  });
  addFormats(ajv);
  return ajv;
}

// '/ai_systems_unknown/0/description' -> 'ai_systems_unknown[0].description'
function toFieldPath(instancePath: string): string {
  return instancePath
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .reduce((path, segment) => {
      if (/^\d+$/.test(segment)) return `${path}[${segment}]`;
      return path ? `${path}.${segment}` : segment;
    }, '');
}

export function formatSchemaError(error: ErrorObject, rootLabel: string): string {
  const path = toFieldPath(error.instancePath);
  const label = path || rootLabel;
  const params = error.params;

  switch (error.keyword) {
    case 'required':
      return `${path ? `${path}.` : ''}${String(params.missingProperty)} is required`;
    case 'minLength':
      return params.limit === 1
        ? `${label} must not be empty`
        : `${label} must be at least ${String(params.limit)} characters`;
    case 'enum': {
      const allowed: unknown = params.allowedValues;
      return `${label} must be one of: ${Array.isArray(allowed) ? allowed.join(', ') : ''}`;
    }
    case 'type':
      return `${label} must be of type ${String(params.type)}`;
    case 'additionalProperties':
      return `${label} has unexpected field "${String(params.additionalProperty)}"`;
    case 'const':
      return `${label} must be ${JSON.stringify(params.allowedValue)}`;
    case 'format':
      return `${label} must be a valid ${String(params.format)}`;
    case 'minItems':
      return `${label} must contain at least ${String(params.limit)} item(s)`;
    default:
      return `${label} ${error.message ?? 'is invalid'}`;
  }
}
