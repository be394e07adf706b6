import type { SchemaObject } from 'ajv'
import { STEP_ACTIONS } from '../types/plan'

/**
 * Shared JSON Schema definitions for the plan wire contract.
 * Every object is closed; only `meta`, `labels` and opaque payloads accept arbitrary keys.
 */
export const wireDefs: Readonly<Record<string, SchemaObject>> = {
  stringMap: {
    type: 'object',
    additionalProperties: { type: 'string' }
  },
  resourceRef: {
    type: 'object',
    additionalProperties: false,
    required: ['kind', 'name', 'provider'],
    properties: {
      kind: { type: 'string' },
      name: { type: 'string' },
      provider: { type: 'string' },
      namespace: { type: 'string' }
    }
  },
  hostRef: {
    type: 'object',
    additionalProperties: false,
    required: ['logicalId'],
    properties: {
      logicalId: { type: 'string' },
      labels: { $ref: '#/$defs/stringMap' }
    }
  },
  stepAction: { enum: [...STEP_ACTIONS] },
  stepIds: {
    type: 'array',
    items: { type: 'string', minLength: 1 }
  },
  planStep: {
    type: 'object',
    additionalProperties: false,
    required: ['id', 'index', 'action', 'target', 'host'],
    properties: {
      id: { type: 'string', minLength: 1 },
      index: { type: 'integer' },
      action: { $ref: '#/$defs/stepAction' },
      target: { $ref: '#/$defs/resourceRef' },
      host: { $ref: '#/$defs/hostRef' },
      inputs: true,
      dependsOn: { $ref: '#/$defs/stepIds' },
      meta: { $ref: '#/$defs/stringMap' }
    }
  },
  hostPlanStep: {
    type: 'object',
    additionalProperties: false,
    required: ['id', 'index', 'action', 'target'],
    properties: {
      id: { type: 'string', minLength: 1 },
      index: { type: 'integer' },
      action: { $ref: '#/$defs/stepAction' },
      target: { $ref: '#/$defs/resourceRef' },
      inputs: true,
      dependsOn: { $ref: '#/$defs/stepIds' },
      meta: { $ref: '#/$defs/stringMap' }
    }
  }
}
