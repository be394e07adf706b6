import type { SchemaObject } from 'ajv'
import { wireDefs } from './wire-defs'

/** JSON Schema for a Plan payload. `version` is checked separately so a mismatch gets its own error. */
export const planSchema: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  required: ['version', 'id', 'steps'],
  properties: {
    version: { type: 'string' },
    id: { type: 'string', minLength: 1 },
    summary: { type: 'string' },
    steps: { type: 'array', items: { $ref: '#/$defs/planStep' } },
    meta: { $ref: '#/$defs/stringMap' }
  },
  $defs: wireDefs
}
