import { KvValidationError } from "../../core/errors"
import { bytes, entry, keys } from "../../tests/utils/kv-test-helpers"
import type { BytesKeyValueStore } from "../bytes-kv-store"

type CreateBytesKvStore = () => BytesKeyValueStore

export function describeKvStoreContract(
  adapterName: string,
  createStore: CreateBytesKvStore,
): void {
  describe(`BytesKeyValueStore Contract Tests - ${adapterName}`, () => {
    let store: BytesKeyValueStore

    beforeEach(() => {
      store = createStore()
    })

    describe("get/set basic semantics", () => {
      it("returns not_found when key was never written", async () => {
        const res = await store.get("missing")

        expect(res).toStrictEqual({ kind: "not_found" })
      })

      it("returns the bytes that were set, byte for byte", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("overwriting a key replaces the stored value", async () => {
        const key = keys.one()

        await store.set(key, bytes.a())
        await store.set(key, bytes.b())

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.b() })
      })

      it("keys are independent", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.two(), bytes.b())

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.b() })
        expect(await store.get(keys.three())).toStrictEqual({ kind: "not_found" })
      })

      it("set does not mutate the input Uint8Array", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)

        expect(value).toStrictEqual(bytes.a())
      })

      it("mutating the input after set does not change the stored value", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)
        value[0] = 42

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("accepts a TTL and the entry stays readable before it elapses", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value, { ttl: { kind: "seconds", seconds: 3600 } })

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.a() })
      })
    })

    describe("delete semantics", () => {
      it("delete on a key that was never written resolves", async () => {
        await expect(store.delete("missing")).resolves.toBeUndefined()
      })

      it("delete removes an existing key", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)
        await store.delete(key)

        expect(await store.get(key)).toStrictEqual({ kind: "not_found" })
      })

      it("delete is idempotent", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)

        await store.delete(key)
        await expect(store.delete(key)).resolves.toBeUndefined()

        expect(await store.get(key)).toStrictEqual({ kind: "not_found" })
      })

      it("delete leaves other keys untouched", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.two(), bytes.b())

        await store.delete(keys.one())

        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.b() })
      })
    })

    describe("key validation", () => {
      it("get rejects an empty key", async () => {
        await expect(store.get("")).rejects.toBeInstanceOf(KvValidationError)
      })

      it("set rejects an empty key", async () => {
        await expect(store.set("", bytes.a())).rejects.toMatchObject({
          code: "kv_invalid_key",
        })
      })

      it("delete rejects an empty key", async () => {
        await expect(store.delete("")).rejects.toMatchObject({ code: "kv_invalid_key" })
      })
    })

    describe("close", () => {
      it("resolves", async () => {
        await expect(store.close()).resolves.toBeUndefined()
      })
    })

    describe("edge cases", () => {
      it("handles empty values", async () => {
        const [key, value] = entry(keys.one(), bytes.empty())

        await store.set(key, value)

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.empty() })
      })

      it("handles values containing null bytes", async () => {
        const key = keys.one()

        await store.set(key, new Uint8Array([0, 0, 0]))

        expect(await store.get(key)).toStrictEqual({
          kind: "found",
          value: new Uint8Array([0, 0, 0]),
        })
      })

      it("handles large values", async () => {
        const value = new Uint8Array(300 * 1024)
        value[0] = 1
        value[value.length - 1] = 2

        await store.set("large", value)

        const res = await store.get("large")

        expect(res.kind).toBe("found")
        if (res.kind !== "found") return

        expect(res.value.byteLength).toBe(value.byteLength)
        expect(res.value[0]).toBe(1)
        expect(res.value[res.value.length - 1]).toBe(2)
      })

      it("handles keys with unusual characters", async () => {
        const key = "weird: key/with?strange#chars%and spaces"

        await store.set(key, bytes.a())

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("handles Unicode keys", async () => {
        const key = "lang:العربية:中文:हिन्दी:😀:é"

        await store.set(key, bytes.b())

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.b() })
      })
    })

    describe("concurrency smoke tests", () => {
      it("concurrent sets to different keys are all visible", async () => {
        await Promise.all([
          store.set(keys.one(), bytes.a()),
          store.set(keys.two(), bytes.b()),
          store.set(keys.three(), bytes.c()),
        ])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.b() })
        expect(await store.get(keys.three())).toStrictEqual({ kind: "found", value: bytes.c() })
      })

      it("concurrent overwrites end with one of the written values", async () => {
        const key = keys.one()

        await Promise.all([store.set(key, bytes.a()), store.set(key, bytes.b())])

        const res = await store.get(key)

        expect(res.kind).toBe("found")
        if (res.kind !== "found") return

        expect([bytes.a(), bytes.b()]).toContainEqual(res.value)
      })
    })
  })
}
