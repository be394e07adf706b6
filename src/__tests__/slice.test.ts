import { describe, it, expect } from 'vitest'
import { slicePlan } from '../core/engine/slice'
import { PlanValidationError } from '../core/engine/errors'
import { plan, sameHostScenario, step } from './fixtures'

describe('slicePlan', () => {
  it('rejects a dependency on another host and names both steps and hosts', () => {
    const p = plan([
      step({ id: 's1', index: 0 }),
      step({ id: 's2', index: 1, host: 'host-a', dependsOn: ['s1'] }),
      step({ id: 's3', index: 2, host: 'host-b', dependsOn: ['s2'] })
    ])
    const out = slicePlan(p)
    expect(out.ok).toBe(false)
    if (out.ok) return
    expect(out.error).toBeInstanceOf(PlanValidationError)
    expect(out.error.code).toBe('PLAN_CROSS_HOST_DEPENDENCY')
    expect(out.error.message).toBe('step "s3" on host "host-b" depends on step "s2" on host "host-a" (cross-host dependencies are not allowed)')
    expect(out.error.stepIds).toEqual(['s3', 's2'])
    expect(out.error.hostIds).toEqual(['host-b', 'host-a'])
  })

  it('slices the same-host variant into one host plan and one global step', () => {
    const out = slicePlan(sameHostScenario())
    expect(out.ok).toBe(true)
    if (!out.ok) return
    const { hostPlans, globalSteps, globalStepIds, globalDependencyRefs } = out.result
    expect(Object.keys(hostPlans)).toEqual(['host-a'])
    const hp = hostPlans['host-a']
    expect(hp.version).toBe('v1')
    expect(hp.planId).toBe('plan-1')
    expect(hp.host).toEqual({ logicalId: 'host-a' })
    expect(hp.steps.map((s) => s.id)).toEqual(['s2', 's3'])
    expect(hp.steps[0].dependsOn).toBeUndefined()
    expect(hp.steps[1].dependsOn).toEqual(['s2'])
    expect(globalSteps.map((s) => s.id)).toEqual(['s1'])
    expect(globalStepIds).toEqual(['s1'])
    expect(globalDependencyRefs).toEqual({ s2: ['s1'] })
  })

  it('host plan steps carry no host field', () => {
    const out = slicePlan(sameHostScenario())
    if (!out.ok) throw out.error
    expect('host' in out.result.hostPlans['host-a'].steps[0]).toBe(false)
  })

  it('is deterministic regardless of input order', () => {
    const a = sameHostScenario()
    const b = plan([...a.steps].reverse())
    const outA = slicePlan(a)
    const outB = slicePlan(b)
    if (!outA.ok || !outB.ok) throw new Error('slice failed')
    expect(outB.result).toEqual(outA.result)
    expect(JSON.stringify(outB.result)).toBe(JSON.stringify(outA.result))
  })

  it('places every step exactly once', () => {
    const p = plan([
      step({ id: 'g2', index: 5 }),
      step({ id: 'g1', index: 0 }),
      step({ id: 'a1', index: 1, host: 'a' }),
      step({ id: 'b1', index: 2, host: 'b' }),
      step({ id: 'a2', index: 3, host: 'a', dependsOn: ['a1'] })
    ])
    const out = slicePlan(p)
    if (!out.ok) throw out.error
    const placed = [
      ...out.result.globalStepIds,
      ...Object.values(out.result.hostPlans).flatMap((hp) => hp.steps.map((s) => s.id))
    ].sort()
    expect(placed).toEqual(['a1', 'a2', 'b1', 'g1', 'g2'])
    expect(out.result.globalStepIds).toEqual(['g1', 'g2'])
    expect(Object.keys(out.result.hostPlans)).toEqual(['a', 'b'])
  })

  it('orders steps with equal index by id', () => {
    const p = plan([
      step({ id: 'z', index: 1, host: 'h' }),
      step({ id: 'm', index: 1, host: 'h' }),
      step({ id: 'a', index: 2, host: 'h' })
    ])
    const out = slicePlan(p)
    if (!out.ok) throw out.error
    expect(out.result.hostPlans.h.steps.map((s) => s.id)).toEqual(['m', 'z', 'a'])
  })

  it('dedupes and sorts local and global dependencies', () => {
    const p = plan([
      step({ id: 'g-b', index: 0 }),
      step({ id: 'g-a', index: 1 }),
      step({ id: 'x', index: 2, host: 'h' }),
      step({ id: 'c', index: 3, host: 'h' }),
      step({ id: 'last', index: 4, host: 'h', dependsOn: ['x', 'g-b', 'c', 'x', 'g-a', 'g-b'] })
    ])
    const out = slicePlan(p)
    if (!out.ok) throw out.error
    const last = out.result.hostPlans.h.steps[2]
    expect(last.id).toBe('last')
    expect(last.dependsOn).toEqual(['c', 'x'])
    expect(out.result.globalDependencyRefs).toEqual({ last: ['g-a', 'g-b'] })
  })

  it('rejects a dependency on an unknown step', () => {
    const out = slicePlan(plan([step({ id: 'b', index: 0, host: 'h', dependsOn: ['z'] })]))
    expect(out.ok).toBe(false)
    if (out.ok) return
    expect(out.error.code).toBe('PLAN_UNKNOWN_STEP')
    expect(out.error.message).toBe('step "b" depends on unknown step "z"')
  })

  it('rejects an unknown dependency on a global step', () => {
    const out = slicePlan(plan([step({ id: 'g', index: 0, dependsOn: ['missing'] })]))
    expect(out.ok).toBe(false)
    if (out.ok) return
    expect(out.error.code).toBe('PLAN_UNKNOWN_STEP')
    expect(out.error.message).toBe('step "g" depends on unknown step "missing"')
  })

  it('rejects duplicate step ids', () => {
    const out = slicePlan(plan([step({ id: 'dup', index: 1, host: 'h' }), step({ id: 'dup', index: 3 })]))
    expect(out.ok).toBe(false)
    if (out.ok) return
    expect(out.error.code).toBe('PLAN_DUPLICATE_STEP_ID')
    expect(out.error.message).toBe('duplicate step id "dup" (indexes 1, 3)')
  })

  it('takes the host ref from the first step of each host', () => {
    const first = { ...step({ id: 'a', index: 0, host: 'h' }), host: { logicalId: 'h', labels: { zone: 'eu' } } }
    const second = { ...step({ id: 'b', index: 1, host: 'h' }), host: { logicalId: 'h', labels: { zone: 'us' } } }
    const out = slicePlan(plan([second, first]))
    if (!out.ok) throw out.error
    expect(out.result.hostPlans.h.host).toEqual({ logicalId: 'h', labels: { zone: 'eu' } })
  })

  it('leaves the input untouched and shares no structure with it', () => {
    const p = plan([
      step({ id: 'g', index: 0 }),
      { ...step({ id: 'a', index: 1, host: 'h', dependsOn: ['g'], inputs: { image: 'web:1', ports: [80] } }), host: { logicalId: 'h', labels: { zone: 'eu' } } }
    ])
    const before = JSON.stringify(p)
    const out = slicePlan(p)
    if (!out.ok) throw out.error
    expect(JSON.stringify(p)).toBe(before)
    const hp = out.result.hostPlans.h
    expect(hp.host).not.toBe(p.steps[1].host)
    expect(hp.host.labels).not.toBe(p.steps[1].host.labels)
    expect(hp.steps[0].target).not.toBe(p.steps[1].target)
    expect(hp.steps[0].inputs).toEqual({ image: 'web:1', ports: [80] })
    expect(hp.steps[0].inputs).not.toBe(p.steps[1].inputs)
    expect(out.result.globalSteps[0]).not.toBe(p.steps[0])
  })

  it('keeps ids that match Object.prototype members as own keys', () => {
    const p = plan([
      step({ id: 'g', index: 0 }),
      step({ id: '__proto__', index: 1, host: '__proto__', dependsOn: ['g'] }),
      step({ id: 'x', index: 2, host: 'h' })
    ])
    const out = slicePlan(p)
    if (!out.ok) throw out.error
    const { hostPlans, globalDependencyRefs } = out.result
    expect(Object.keys(hostPlans)).toEqual(['__proto__', 'h'])
    expect(Object.hasOwn(hostPlans, '__proto__')).toBe(true)
    expect(hostPlans['__proto__'].steps.map((s) => s.id)).toEqual(['__proto__'])
    expect(Object.keys(globalDependencyRefs)).toEqual(['__proto__'])
    expect(globalDependencyRefs['__proto__']).toEqual(['g'])
  })

  it('lists integer-like host ids first, in numeric order', () => {
    const p = plan([
      step({ id: 'a', index: 0, host: 'b' }),
      step({ id: 'c', index: 1, host: '10' }),
      step({ id: 'd', index: 2, host: '9' })
    ])
    const out = slicePlan(p)
    if (!out.ok) throw out.error
    expect(Object.keys(out.result.hostPlans)).toEqual(['9', '10', 'b'])
    const again = slicePlan(plan([...p.steps].reverse()))
    if (!again.ok) throw again.error
    expect(JSON.stringify(again.result)).toBe(JSON.stringify(out.result))
  })

  it('returns empty collections for an empty plan', () => {
    const out = slicePlan(plan([]))
    if (!out.ok) throw out.error
    expect(out.result).toEqual({ hostPlans: {}, globalSteps: [], globalStepIds: [], globalDependencyRefs: {} })
  })
})
