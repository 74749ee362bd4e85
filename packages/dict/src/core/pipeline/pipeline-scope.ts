import { AsyncLocalStorage } from "node:async_hooks"

import { serializeError } from "@keel/errors"
import type { Logger } from "@keel/logger"

import type { StoreBatch, StoreClient } from "../../ports/store-client"
import { type DelCommand, type SetCommand, toArgs } from "../commands/store-command"
import { PipelineFlushError } from "../errors"

/**
 * Where a write went: straight to the store (with its reply) or into the
 * open batch, where the reply only exists after the flush.
 */
export type Dispatch<R> = { readonly kind: "sent"; readonly reply: R } | { readonly kind: "queued" }

export type PipelineScopeDeps = {
  client: StoreClient
  logger: Logger
}

type BodyOutcome<R> = { kind: "ok"; value: R } | { kind: "failed"; error: unknown }

type Frame = {
  readonly batch: StoreBatch
  queued: number
  open: boolean
}

/**
 * Reentrant write batching for one dict.
 *
 * @remarks
 * The outermost `run` opens a MULTI batch bound to the async context of its
 * body. SET and DEL dispatched from that context are queued there; nested
 * `run` calls share the batch. Writes from other callers, and concurrent
 * `run` calls, never see it. Only the outermost exit sends the batch, whether
 * or not the body threw. Reads never go through the batch.
 */
export class PipelineScope {
  private readonly frames = new AsyncLocalStorage<Frame>()

  constructor(private readonly deps: PipelineScopeDeps) {}

  /** Whether the calling async context is inside an open scope. */
  get active(): boolean {
    return this.openFrame() !== undefined
  }

  async run<R>(body: () => Promise<R>): Promise<R> {
    if (this.openFrame()) return body()

    const frame: Frame = { batch: this.deps.client.multi(), queued: 0, open: true }

    let outcome: BodyOutcome<R>

    try {
      outcome = { kind: "ok", value: await this.frames.run(frame, body) }
    } catch (error) {
      outcome = { kind: "failed", error }
    }

    frame.open = false

    await this.flush(frame, outcome.kind === "failed" ? outcome.error : undefined)

    if (outcome.kind === "failed") throw outcome.error

    return outcome.value
  }

  async set(command: SetCommand): Promise<Dispatch<string | null>> {
    const { client, logger } = this.deps

    const frame = this.openFrame()

    if (frame) {
      frame.batch.set(command.key, command.value, command.options)
      frame.queued += 1
      logger.debug("Queued command", { args: toArgs(command) })

      return { kind: "queued" }
    }

    logger.debug("Sending command", { args: toArgs(command) })

    return { kind: "sent", reply: await client.set(command.key, command.value, command.options) }
  }

  async del(command: DelCommand): Promise<Dispatch<number>> {
    const { client, logger } = this.deps

    const frame = this.openFrame()

    if (frame) {
      frame.batch.del(command.keys)
      frame.queued += 1
      logger.debug("Queued command", { args: toArgs(command) })

      return { kind: "queued" }
    }

    logger.debug("Sending command", { args: toArgs(command) })

    return { kind: "sent", reply: await client.del(command.keys) }
  }

  // A write that outlives its scope's body goes live rather than into a sent batch.
  private openFrame(): Frame | undefined {
    const frame = this.frames.getStore()

    return frame?.open ? frame : undefined
  }

  private async flush({ batch, queued }: Frame, bodyError: unknown): Promise<void> {
    const { logger } = this.deps

    if (queued === 0) return

    try {
      await batch.exec()
      logger.debug("Pipeline flushed", { queued })
    } catch (err) {
      const context =
        bodyError === undefined ? { queued } : { queued, bodyError: serializeError(bodyError) }

      logger.error("Pipeline flush failed", { ...context, err })

      throw new PipelineFlushError(context, err)
    }
  }
}
