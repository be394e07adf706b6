import { describe, it, expect } from 'vitest'
import { decodeStepInputs, hasTypedInputs, InputsError } from '../core/inputs'
import { normalizePath } from '../core/inputs/common'

const HASH = 'a'.repeat(64)

describe('normalizePath', () => {
  it('converts backslashes and collapses repeated slashes', () => {
    expect(normalizePath('deploy\\\\compose//base.yml', 'p')).toBe('deploy/compose/base.yml')
  })

  it('keeps a lone dot', () => {
    expect(normalizePath(' . ', 'workdir')).toBe('.')
  })

  it('rejects absolute, home-relative and dotted paths', () => {
    expect(() => normalizePath('/etc/compose.yml', 'compose_path')).toThrow('compose_path: path must be relative: "/etc/compose.yml"')
    expect(() => normalizePath('~/app', 'workdir')).toThrow('workdir: path must be relative: "~/app"')
    expect(() => normalizePath('C:\\app', 'workdir')).toThrow('workdir: path must be relative: "C:/app"')
    expect(() => normalizePath('a/../b', 'context')).toThrow(`context: path must not contain '.' or '..' segments: "a/../b"`)
    expect(() => normalizePath('  ', 'context')).toThrow('context: path is empty')
  })
})

describe('decodeStepInputs', () => {
  it('passes untyped actions through untouched', () => {
    const raw = { anything: [1, 'two'] }
    const out = decodeStepInputs('create', raw)
    expect(out).toEqual({ ok: true, value: { action: 'create', inputs: raw } })
    expect(hasTypedInputs('create')).toBe(false)
    expect(hasTypedInputs('build')).toBe(true)
  })

  it('normalizes build inputs', () => {
    const out = decodeStepInputs('build', {
      provider: ' docker ',
      workdir: 'apps\\web',
      dockerfile: 'Dockerfile',
      context: '.',
      tags: ['web:2', 'web:1'],
      build_args: [{ key: 'NODE_ENV', value: 'production ' }, { key: 'A', value: '1' }]
    })
    expect(out).toEqual({
      ok: true,
      value: {
        action: 'build',
        inputs: {
          provider: 'docker',
          workdir: 'apps/web',
          dockerfile: 'Dockerfile',
          context: '.',
          tags: ['web:1', 'web:2'],
          build_args: [{ key: 'A', value: '1' }, { key: 'NODE_ENV', value: 'production' }]
        }
      }
    })
  })

  it('requires inputs for typed actions', () => {
    const out = decodeStepInputs('migrate', undefined)
    if (out.ok) throw new Error('expected failure')
    expect(out.error).toBeInstanceOf(InputsError)
    expect(out.error.code).toBe('INPUTS_INVALID')
    expect(out.error.message).toBe('invalid migrate inputs: inputs are required')
  })

  it('rejects unknown fields', () => {
    const out = decodeStepInputs('rollout', { mode: 'rolling', surge: 2 })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe('invalid rollout inputs: unknown field "surge"')
  })

  it('reports every rule violation', () => {
    const out = decodeStepInputs('rollout', { mode: ' ', batch_size: -1, targets: ['a', ''] })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe('rollout inputs validation failed: mode is required; batch_size must be > 0 if present; targets contains empty value')
  })

  it('keeps migrate args in order', () => {
    const out = decodeStepInputs('migrate', { database: 'main', strategy: 'up', engine: 'sql', path: 'db//migrations', conn_env: 'DATABASE_URL', args: ['--b', '--a'] })
    if (!out.ok) throw out.error
    expect(out.value).toEqual({
      action: 'migrate',
      inputs: { database: 'main', strategy: 'up', engine: 'sql', path: 'db/migrations', conn_env: 'DATABASE_URL', args: ['--b', '--a'] }
    })
  })

  it('needs exactly one of endpoints or services for health checks', () => {
    const neither = decodeStepInputs('health_check', { environment: 'prod' })
    if (neither.ok) throw new Error('expected failure')
    expect(neither.error.message).toBe('health_check inputs validation failed: exactly one of endpoints or services must be provided')
    const both = decodeStepInputs('health_check', { environment: 'prod', services: ['web'], endpoints: [{ name: 'web', url: 'http://web/health', expected_status: 200, method: 'GET' }] })
    expect(both.ok).toBe(false)
  })

  it('checks endpoint status codes', () => {
    const endpoint = { name: 'api', url: 'http://api/health', method: 'GET' }
    const out = decodeStepInputs('health_check', { environment: 'prod', endpoints: [{ ...endpoint, expected_status: 0 }] })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe('health_check inputs validation failed: endpoints[api].expected_status must be a valid HTTP status')
    expect(decodeStepInputs('health_check', { environment: 'prod', endpoints: [{ ...endpoint, expected_status: 42 }] }).ok).toBe(true)
  })

  it('treats a zero timeout or interval as unset', () => {
    const out = decodeStepInputs('health_check', { environment: 'prod', services: ['web'], timeout_seconds: 0, interval_seconds: 5 })
    if (!out.ok) throw out.error
    expect(out.value).toEqual({ action: 'health_check', inputs: { environment: 'prod', services: ['web'], interval_seconds: 5 } })
    const negative = decodeStepInputs('health_check', { environment: 'prod', services: ['web'], timeout_seconds: -5 })
    if (negative.ok) throw new Error('expected failure')
    expect(negative.error.message).toBe('health_check inputs validation failed: timeout_seconds must be > 0 if present')
  })

  it('requires explicit pull and detach for apply_compose', () => {
    const out = decodeStepInputs('apply_compose', { environment: 'prod', compose_path: 'compose.yml', project_name: 'shop', pull: true })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe("invalid apply_compose inputs: / must have required property 'detach'")
  })

  it('checks the compose hash pair', () => {
    const base = { environment: 'prod', compose_path: 'compose.yml', project_name: 'shop', pull: false, detach: true }
    expect(decodeStepInputs('apply_compose', { ...base, expected_compose_hash_alg: 'sha256', expected_compose_hash: HASH }).ok).toBe(true)
    const badAlg = decodeStepInputs('apply_compose', { ...base, expected_compose_hash_alg: 'md5', expected_compose_hash: HASH })
    if (badAlg.ok) throw new Error('expected failure')
    expect(badAlg.error.message).toBe("apply_compose inputs validation failed: expected_compose_hash_alg must be 'sha256'")
  })

  it('reports a bad path as an inputs error', () => {
    const out = decodeStepInputs('apply_compose', { environment: 'prod', compose_path: '../compose.yml', project_name: 'shop', pull: false, detach: false })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe(`compose_path: path must not contain '.' or '..' segments: "../compose.yml"`)
  })

  it('needs exactly one compose source for render_compose', () => {
    const out = decodeStepInputs('render_compose', { environment: 'prod', output_path: 'out/compose.yml' })
    expect(out.ok).toBe(false)
  })

  it('normalizes render_compose overlays and variables', () => {
    const out = decodeStepInputs('render_compose', {
      environment: ' prod ',
      base_compose_inline: 'services: {}',
      overlays: [{ name: 'z', path: 'o\\z.yml' }, { name: 'a', path: 'o//a.yml' }],
      variables: [{ key: 'B', value: '2' }, { key: 'A', value: ' 1 ' }],
      output_path: 'out\\compose.yml'
    })
    if (!out.ok) throw out.error
    expect(out.value).toEqual({
      action: 'render_compose',
      inputs: {
        environment: 'prod',
        base_compose_inline: 'services: {}',
        overlays: [{ name: 'a', path: 'o/a.yml' }, { name: 'z', path: 'o/z.yml' }],
        variables: [{ key: 'A', value: '1' }, { key: 'B', value: '2' }],
        output_path: 'out/compose.yml'
      }
    })
  })

  it('rejects an overlay path that leaves the workspace', () => {
    const out = decodeStepInputs('render_compose', {
      environment: 'prod',
      base_compose_path: 'compose.yml',
      overlays: [{ name: 'a', path: '../a.yml' }],
      output_path: 'out.yml'
    })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe(`overlays[0].path: path must not contain '.' or '..' segments: "../a.yml"`)
  })
})

describe('rollout inputs', () => {
  it('requires a mode', () => {
    const out = decodeStepInputs('rollout', { mode: '  ' })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe('rollout inputs validation failed: mode is required')
  })

  it('rejects a negative batch size', () => {
    const out = decodeStepInputs('rollout', { mode: 'rolling', batch_size: -2 })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe('rollout inputs validation failed: batch_size must be > 0 if present')
  })

  it('treats a zero batch size as unset', () => {
    const out = decodeStepInputs('rollout', { mode: 'rolling', batch_size: 0 })
    if (!out.ok) throw out.error
    expect(out.value).toEqual({ action: 'rollout', inputs: { mode: 'rolling' } })
  })

  it('rejects a blank target', () => {
    const out = decodeStepInputs('rollout', { mode: 'rolling', targets: ['web-1', ' '] })
    if (out.ok) throw new Error('expected failure')
    expect(out.error.message).toBe('rollout inputs validation failed: targets contains empty value')
  })

  it('trims and sorts targets', () => {
    const out = decodeStepInputs('rollout', { mode: ' rolling ', batch_size: 2, targets: [' web-2', 'web-1'] })
    if (!out.ok) throw out.error
    expect(out.value).toEqual({ action: 'rollout', inputs: { mode: 'rolling', batch_size: 2, targets: ['web-1', 'web-2'] } })
  })
})
