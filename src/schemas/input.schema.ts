// JSON Schema for raw flaw report form input
// Extra form fields (CSRF tokens, submit buttons) are allowed and dropped by the validator

import { SEVERITIES } from '../types/reports.js';

export const MIN_FLAW_DESCRIPTION_LENGTH = 10;

export const reportInputSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['flaw_description', 'flaw_severity'],
  properties: {
    ai_systems: { type: 'array', items: { type: 'string' } },
    ai_systems_unknown: {
      type: 'array',
      items: {
        type: 'object',
        required: ['description'],
        properties: {
          description: { type: 'string', minLength: 1 }
        }
      }
    },
    flaw_description: { type: 'string', minLength: MIN_FLAW_DESCRIPTION_LENGTH },
    flaw_severity: { type: 'string', enum: SEVERITIES }
  }
} as const;
