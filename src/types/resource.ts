/**
 * Resource model shared by planners, the slicer and executors.
 * Payloads are opaque to this core: only the owning provider interprets `data`.
 */

export type JsonValue = string | number | boolean | null | readonly JsonValue[] | { readonly [key: string]: JsonValue }

/** Free-form annotations (meta, labels). */
export type StringMap = Readonly<Record<string, string>>

/** Identity tuple for any managed resource. */
export interface ResourceRef {
  /** e.g. "service", "network", "volume", "droplet" */
  readonly kind: string
  readonly name: string
  /** e.g. "docker-compose", "kubernetes", "digitalocean" */
  readonly provider: string
  readonly namespace?: string
}

export interface ResourceSpec {
  readonly ref: ResourceRef
  /** Desired payload, owned by the provider. */
  readonly data: JsonValue
  readonly meta?: StringMap
}

export interface ResourceState {
  readonly ref: ResourceRef
  /** Observed payload, owned by the provider. */
  readonly data: JsonValue
  readonly meta?: StringMap
}

/** Desired state. Resources must be ordered by kind, then name. */
export interface TopologySnapshot {
  readonly version: string
  readonly meta?: StringMap
  readonly resources: readonly ResourceSpec[]
}

/** Observed state. Resources must be ordered by kind, then name. */
export interface StateSnapshot {
  readonly version: string
  readonly meta?: StringMap
  readonly resources: readonly ResourceState[]
}
