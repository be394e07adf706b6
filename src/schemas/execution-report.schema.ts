import type { SchemaObject } from 'ajv'
import { wireDefs } from './wire-defs'

export const executionReportSchema: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  required: ['planId', 'status', 'steps'],
  properties: {
    planId: { type: 'string' },
    status: { enum: ['succeeded', 'failed', 'partial'] },
    steps: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['stepId', 'host', 'status'],
        properties: {
          stepId: { type: 'string', minLength: 1 },
          host: { $ref: '#/$defs/hostRef' },
          status: { enum: ['pending', 'running', 'succeeded', 'failed', 'skipped'] },
          startedAt: { type: 'string' },
          completedAt: { type: 'string' },
          error: {
            type: 'object',
            additionalProperties: false,
            required: ['message'],
            properties: {
              code: { type: 'string' },
              message: { type: 'string' }
            }
          },
          logs: {
            type: 'array',
            items: {
              type: 'object',
              additionalProperties: false,
              required: ['stream', 'message'],
              properties: {
                time: { type: 'string' },
                stream: { enum: ['stdout', 'stderr', 'system'] },
                message: { type: 'string' }
              }
            }
          },
          meta: { $ref: '#/$defs/stringMap' }
        }
      }
    },
    meta: { $ref: '#/$defs/stringMap' }
  },
  $defs: wireDefs
}
