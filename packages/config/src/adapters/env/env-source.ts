import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Keep only variables starting with this prefix, with the prefix removed.
   *
   * @example "TENANT_A_" turns `TENANT_A_KV_DYNAMODB_TABLE` into `KV_DYNAMODB_TABLE`
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: EnvSourceOptions = {}) {
    this.name = opts.prefix ? `env:${opts.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const env = this.opts.env ?? process.env
    const prefix = this.opts.prefix

    if (!prefix) return { ...env }

    return Object.fromEntries(
      Object.entries(env)
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]) => [key.slice(prefix.length), value]),
    )
  }
}
