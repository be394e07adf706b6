import type { SchemaObject } from 'ajv'

/**
 * Closed schemas for the typed inputs of each step action.
 * Presence and types are checked here; emptiness and cross-field rules live in
 * the validators under core/inputs.
 */

function closed(required: readonly string[], properties: Record<string, SchemaObject>): SchemaObject {
  return { type: 'object', additionalProperties: false, required: [...required], properties }
}

const str: SchemaObject = { type: 'string' }
const int: SchemaObject = { type: 'integer' }
const bool: SchemaObject = { type: 'boolean' }
const strList: SchemaObject = { type: 'array', items: str }
const keyValueList: SchemaObject = { type: 'array', items: closed(['key', 'value'], { key: str, value: str }) }

export const buildInputsSchema: SchemaObject = closed(['provider', 'workdir', 'dockerfile', 'context'], {
  provider: str,
  workdir: str,
  target: str,
  dockerfile: str,
  context: str,
  tags: strList,
  build_args: keyValueList,
  labels: keyValueList
})

export const migrateInputsSchema: SchemaObject = closed(['database', 'strategy', 'engine', 'path', 'conn_env'], {
  database: str,
  strategy: str,
  engine: str,
  path: str,
  conn_env: str,
  timeout_seconds: int,
  args: strList
})

export const healthCheckInputsSchema: SchemaObject = closed(['environment'], {
  environment: str,
  endpoints: {
    type: 'array',
    items: closed(['name', 'url', 'expected_status', 'method'], {
      name: str,
      url: str,
      expected_status: int,
      method: str,
      headers: keyValueList
    })
  },
  services: strList,
  timeout_seconds: int,
  interval_seconds: int,
  retries: int
})

export const rolloutInputsSchema: SchemaObject = closed(['mode'], {
  mode: str,
  batch_size: int,
  targets: strList
})

export const renderComposeInputsSchema: SchemaObject = closed(['environment', 'output_path'], {
  environment: str,
  base_compose_path: str,
  base_compose_inline: str,
  overlays: { type: 'array', items: closed(['name', 'path'], { name: str, path: str }) },
  variables: keyValueList,
  output_path: str,
  expected_compose_hash_alg: str,
  expected_compose_hash: str
})

export const applyComposeInputsSchema: SchemaObject = closed(['environment', 'compose_path', 'project_name', 'pull', 'detach'], {
  environment: str,
  compose_path: str,
  project_name: str,
  pull: bool,
  detach: bool,
  services: strList,
  expected_compose_hash_alg: str,
  expected_compose_hash: str
})
