import type { SchemaObject } from 'ajv'
import { wireDefs } from './wire-defs'

/** JSON Schema for a HostPlan payload as received by a per-host agent. */
export const hostPlanSchema: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  required: ['version', 'planId', 'host', 'steps'],
  properties: {
    version: { type: 'string' },
    planId: { type: 'string' },
    host: { $ref: '#/$defs/hostRef' },
    steps: { type: 'array', items: { $ref: '#/$defs/hostPlanStep' } },
    meta: { $ref: '#/$defs/stringMap' }
  },
  $defs: wireDefs
}
