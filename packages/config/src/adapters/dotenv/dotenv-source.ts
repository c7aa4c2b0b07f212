import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * When false a missing file loads as an empty record. Other read errors
   * are always thrown.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await this.read(path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file))

    return content === undefined ? {} : parse(content)
  }

  private async read(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, "utf8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return undefined

      throw err
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
