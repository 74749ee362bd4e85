import type { Logger } from "@keel/logger"
import { mock } from "vitest-mock-extended"

import type { StoreDictOptions } from "../../ports/dict-options"
import type { StoreBatch, StoreClient } from "../../ports/store-client"
import type { Mock } from "../../tests/mock"
import { createStoreDict } from "../create-store-dict"
import { NotFoundError, PipelineFlushError } from "../errors"
import type { StoreDict } from "../store-dict"

describe("StoreDict (commands sent)", () => {
  let client: Mock<StoreClient>
  let batch: Mock<StoreBatch>

  const dictWith = (opts: Partial<StoreDictOptions> = {}): StoreDict<unknown> =>
    createStoreDict({ client }, { namespace: "t", ...opts })

  beforeEach(() => {
    client = mock<StoreClient>()
    batch = mock<StoreBatch>()
    client.multi.mockReturnValue(batch)
    batch.exec.mockResolvedValue([])
  })

  describe("set", () => {
    it("sends a plain SET without expiry by default", async () => {
      await dictWith().set("a", 1)

      expect(client.exists).not.toHaveBeenCalled()
      expect(client.set).toHaveBeenCalledExactlyOnceWith("t:a", "integer:1", {})
    })

    it("sends EX with the configured expiry, floored and clamped", async () => {
      await dictWith({ expire: 0.5 }).set("a", 1)
      await dictWith({ expire: { kind: "seconds", seconds: 7.9 } }).set("b", 1)

      expect(client.set).toHaveBeenNthCalledWith(1, "t:a", "integer:1", { EX: 1 })
      expect(client.set).toHaveBeenNthCalledWith(2, "t:b", "integer:1", { EX: 7 })
    })

    it("sends KEEPTTL for existing keys when preserving", async () => {
      client.exists.mockResolvedValue(1)

      await dictWith({ expire: 30, preserveExpiration: true }).set("a", "x")

      expect(client.exists).toHaveBeenCalledExactlyOnceWith("t:a")
      expect(client.set).toHaveBeenCalledExactlyOnceWith("t:a", "string:x", { KEEPTTL: true })
    })
  })

  describe("has", () => {
    it("asks EXISTS without fetching the value", async () => {
      client.exists.mockResolvedValueOnce(1).mockResolvedValueOnce(0)

      expect(await dictWith().has("a")).toBe(true)
      expect(await dictWith().has("b")).toBe(false)

      expect(client.exists).toHaveBeenNthCalledWith(1, "t:a")
      expect(client.exists).toHaveBeenNthCalledWith(2, "t:b")
      expect(client.get).not.toHaveBeenCalled()
    })
  })

  describe("setDefault", () => {
    it("sends one SET NX GET with EX", async () => {
      client.set.mockResolvedValue(null)

      expect(await dictWith({ expire: 10 }).setDefault("a", "x")).toBe("x")
      expect(client.set).toHaveBeenCalledExactlyOnceWith("t:a", "string:x", {
        NX: true,
        GET: true,
        EX: 10,
      })
    })

    it("returns the decoded value already stored", async () => {
      client.set.mockResolvedValue("list:[1,2]")

      expect(await dictWith().setDefault("a", [])).toStrictEqual([1, 2])
    })

    it("goes to the store directly inside a pipeline", async () => {
      client.set.mockResolvedValue(null)
      const dict = dictWith()

      await dict.pipeline(async () => {
        await dict.setDefault("a", 1)
      })

      expect(client.set).toHaveBeenCalledOnce()
      expect(batch.set).not.toHaveBeenCalled()
      expect(batch.exec).not.toHaveBeenCalled()
    })
  })

  describe("pop", () => {
    it("uses GETDEL", async () => {
      client.getDel.mockResolvedValue("boolean:true")

      expect(await dictWith().pop("a")).toBe(true)
      expect(client.getDel).toHaveBeenCalledExactlyOnceWith("t:a")
    })
  })

  describe("delete", () => {
    it("throws in strict mode when DEL removed nothing", async () => {
      client.del.mockResolvedValue(0)

      await expect(dictWith({ raiseOnMissingDelete: true }).delete("a")).rejects.toThrow(
        NotFoundError,
      )
      expect(client.del).toHaveBeenCalledExactlyOnceWith(["t:a"])
    })

    it("does not queue a strict delete of an absent key", async () => {
      client.exists.mockResolvedValue(0)
      const dict = dictWith({ raiseOnMissingDelete: true })

      await expect(dict.pipeline(() => dict.delete("a"))).rejects.toThrow(NotFoundError)
      expect(batch.del).not.toHaveBeenCalled()
    })
  })

  describe("pipeline", () => {
    it("queues writes on one batch across nested scopes", async () => {
      const dict = dictWith({ expire: 5 })

      await dict.pipeline(async () => {
        await dict.set("a", 1)
        await dict.pipeline(async () => {
          await dict.delete("b")
        })
      })

      expect(client.set).not.toHaveBeenCalled()
      expect(client.del).not.toHaveBeenCalled()
      expect(batch.set).toHaveBeenCalledExactlyOnceWith("t:a", "integer:1", { EX: 5 })
      expect(batch.del).toHaveBeenCalledExactlyOnceWith(["t:b"])
      expect(client.multi).toHaveBeenCalledOnce()
      expect(batch.exec).toHaveBeenCalledOnce()
    })

    it("raises PipelineFlushError and logs when the flush fails", async () => {
      const logger = mock<Logger>()
      logger.child.mockReturnValue(logger)
      batch.exec.mockRejectedValue(new Error("connection reset"))

      const dict = createStoreDict({ client, logger }, { namespace: "t" })

      await expect(dict.pipeline(() => dict.set("a", 1))).rejects.toThrow(PipelineFlushError)
      expect(logger.child).toHaveBeenCalledExactlyOnceWith({
        module: "store-dict",
        namespace: "t",
      })
      expect(logger.error).toHaveBeenCalledExactlyOnceWith(
        "Pipeline flush failed",
        expect.objectContaining({ queued: 1 }),
      )
    })
  })

  describe("getTtl", () => {
    it.each([
      [42, 42],
      [-1, undefined],
      [-2, undefined],
    ])("maps TTL reply %i to %s", async (reply, expected) => {
      client.ttl.mockResolvedValue(reply)

      expect(await dictWith().getTtl("a")).toBe(expected)
    })
  })

  describe("clear", () => {
    it("deletes scanned keys in batches inside one pipeline", async () => {
      const scanning = mock<StoreClient>({
        scan: vi
          .fn()
          .mockResolvedValueOnce({ cursor: "5", keys: ["t:a", "t:b"] })
          .mockResolvedValueOnce({ cursor: "0", keys: ["t:c"] }),
      })
      scanning.multi.mockReturnValue(batch)

      await createStoreDict({ client: scanning }, { namespace: "t", batchSizeHint: 2 }).clear()

      expect(batch.del).toHaveBeenNthCalledWith(1, ["t:a", "t:b"])
      expect(batch.del).toHaveBeenNthCalledWith(2, ["t:c"])
      expect(batch.exec).toHaveBeenCalledOnce()
    })
  })
})
