// Strict JSON Schema for the published JSON-LD flaw report

import { SEVERITIES } from '../types/reports.js';
import { MIN_FLAW_DESCRIPTION_LENGTH } from './input.schema.js';

export const reportOutputSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['@context', '@type', '@id', 'name', 'description', 'aiSystem', 'severity'],
  additionalProperties: false,
  properties: {
    '@context': { type: 'array', minItems: 2, maxItems: 2 },
    '@type': { type: 'string', const: 'aifr:AIFlawReport' },
    '@id': { type: 'string', format: 'uri' },
    name: { type: 'string', minLength: 1 },
    description: { type: 'string', minLength: MIN_FLAW_DESCRIPTION_LENGTH },
    aiSystem: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['@id'],
        properties: {
          '@id': { type: 'string', format: 'uri' }
        }
      }
    },
    severity: { type: 'string', enum: SEVERITIES }
  }
} as const;
