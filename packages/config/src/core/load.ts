import { BaseError } from "@tablekv/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /**
   * Read in order; a later source overrides an earlier one key by key.
   *
   * @default [new EnvSource()]
   */
  sources?: ConfigSource[]
}

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(error: z.ZodError) {
    super(`Configuration validation failed:\n${z.prettifyError(error)}`, {
      code: "config_invalid",
      context: { issues: error.issues.map((issue) => issue.path.map(String).join(".")) },
      cause: error,
    })
  }
}

type Merged = {
  values: Record<string, unknown>
  origin: Map<string, string>
}

async function mergeSources(sources: ConfigSource[]): Promise<Merged> {
  const merged: Merged = { values: {}, origin: new Map() }

  for (const source of sources) {
    const entries = Object.entries(await source.load()).filter(([, v]) => v !== undefined)

    for (const [key, value] of entries) {
      merged.values[key] = value
      merged.origin.set(key, source.name)
    }
  }

  return merged
}

/**
 * Reads every source, validates the merged record against `schema` and
 * remembers where each value came from. Keys filled by a schema default
 * report "default".
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const { values, origin } = await mergeSources(sources)
  const parsed = schema.safeParse(values)

  if (!parsed.success) throw new ConfigValidationError(parsed.error)

  const provenance = Object.fromEntries(
    Object.keys(parsed.data).map((key) => [key, origin.get(key) ?? "default"]),
  )

  return new Config<T>(parsed.data, provenance, new Set(Object.keys(values)))
}
