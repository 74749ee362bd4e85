import type { DictTtl } from "../../ports/dict-options"
import { ValidationError } from "../errors"

function rawSeconds(ttl: DictTtl): number {
  if (typeof ttl === "number") return ttl

  return ttl.kind === "seconds" ? ttl.seconds : ttl.milliseconds / 1000
}

/** Whole seconds for `ttl`, floored and never below 1. */
export function toExpireSeconds(ttl: DictTtl): number {
  return Math.max(1, Math.floor(rawSeconds(ttl)))
}

export function assertValidTtl(ttl: DictTtl | undefined): void {
  if (ttl === undefined || Number.isFinite(rawSeconds(ttl))) return

  throw new ValidationError("expire must be a finite duration", { expire: ttl })
}

/**
 * The expiry settings a dict writes with.
 *
 * @remarks
 * `override` swaps `expire` for the duration of a body and restores it
 * afterwards. The swap is visible to every call made on the owning dict
 * meanwhile, not only to calls made from inside the body.
 */
export class TtlPolicy {
  private expire: DictTtl | undefined

  constructor(
    expire: DictTtl | undefined,
    readonly preserveExpiration: boolean,
  ) {
    assertValidTtl(expire)
    this.expire = expire
  }

  /** Seconds to send with EX, or undefined when keys should not expire. */
  expireSeconds(): number | undefined {
    return this.expire === undefined ? undefined : toExpireSeconds(this.expire)
  }

  async override<R>(expire: DictTtl | undefined, body: () => Promise<R>): Promise<R> {
    assertValidTtl(expire)

    const previous = this.expire
    this.expire = expire

    try {
      return await body()
    } finally {
      this.expire = previous
    }
  }
}
