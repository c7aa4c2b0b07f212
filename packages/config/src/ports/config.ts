/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     KV_DYNAMODB_TABLE: z.string().min(1),
 *     KV_TTL_SECONDS: z.coerce.number().default(0),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.KV_TTL_SECONDS        // 0
 * config.explain("KV_DYNAMODB_TABLE") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g., "env", "dotenv:.env", "default" for Zod defaults).
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns the names of all sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos or stale config.
   */
  unknownKeys(): string[]
}
