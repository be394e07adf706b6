/** Contents of fleetplan.config.json. Every field is optional. */
export interface FleetplanConfig {
  /** Where `plan slice` writes host plans when --output-dir is not given. */
  readonly outputDir?: string
  /** Host plans `apply` runs at once when --max-parallel is not given. */
  readonly maxParallel?: number
  /** Environment name used by `plan id` when --env is not given. */
  readonly environment?: string
}
