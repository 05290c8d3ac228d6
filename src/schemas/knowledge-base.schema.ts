// JSON Schema for a knowledge base collection file (ai-systems.jsonld, organizations.jsonld)

export const INTERNAL_FIELD_MARKER = '_';
export const INTERNAL_RECORD_KEY = '_aifr_internal';

export const collectionSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['@graph'],
  properties: {
    '@context': {},
    '@graph': {
      type: 'array',
      items: {
        type: 'object',
        required: ['@id'],
        properties: {
          '@id': { type: 'string', format: 'uri' },
          [INTERNAL_RECORD_KEY]: {
            type: 'object',
            properties: {
              slug: { type: 'string', minLength: 1 },
              displayName: { type: 'string', minLength: 1 }
            }
          }
        }
      }
    }
  }
} as const;
