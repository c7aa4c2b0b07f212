import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  make: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "KV_DYNAMODB_TABLE=sessions\n")

    return new DotenvSource({ file: ".env", required: true, cwd })
  },
  expected: { KV_DYNAMODB_TABLE: "sessions" },
})
