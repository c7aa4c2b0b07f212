/**
 * Where raw configuration values come from.
 *
 * @remarks
 * A source only reads. Coercion, defaults and validation belong to the schema
 * given to `loadConfig`. Sources are merged in order and later ones win; a
 * key mapped to `undefined` counts as absent.
 */
export interface ConfigSource {
  /** Label reported by `IConfig.explain`, e.g. "env" or "dotenv:.env". */
  readonly name: string

  /** Resolves to a fresh object on every call. */
  load(): Promise<Record<string, unknown>>
}
