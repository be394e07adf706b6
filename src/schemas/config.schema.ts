import type { SchemaObject } from 'ajv'

/** JSON Schema for fleetplan.config.json. */
export const configSchema: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  properties: {
    outputDir: { type: 'string', minLength: 1 },
    maxParallel: { type: 'integer', minimum: 1 },
    environment: { type: 'string', minLength: 1 }
  }
}
