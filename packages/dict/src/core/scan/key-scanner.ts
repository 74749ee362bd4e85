import type { StoreClient, StoreScanOptions, StoreScanReply } from "../../ports/store-client"
import { UnsupportedError } from "../errors"
import type { KeyCodec } from "../keys/key-codec"

export type KeyScannerDeps = {
  client: StoreClient
  keys: KeyCodec
}

export type KeyScannerOptions = {
  batchSizeHint: number
}

export type ScanOptions = {
  /** Omit the COUNT hint and let the store pick its page size. */
  full?: boolean

  /** Name reported by UnsupportedError. @default "scan" */
  operation?: string
}

type ScanFn = (cursor: string, opts?: StoreScanOptions) => Promise<StoreScanReply>

const START_CURSOR = "0"

/**
 * Enumerates formatted keys of one namespace with SCAN.
 *
 * @remarks
 * SCAN may return a key more than once and may miss keys written during the
 * iteration; callers that count keys must deduplicate.
 */
export class KeyScanner {
  constructor(
    private readonly deps: KeyScannerDeps,
    private readonly opts: KeyScannerOptions,
  ) {}

  async *scan(searchTerm = "", opts: ScanOptions = {}): AsyncGenerator<string, void, undefined> {
    const scan = this.scanFn(opts.operation ?? "scan")
    const scanOpts: StoreScanOptions = { MATCH: this.deps.keys.scanPattern(searchTerm) }

    if (!opts.full) scanOpts.COUNT = this.opts.batchSizeHint

    let cursor = START_CURSOR

    do {
      const reply = await scan(cursor, scanOpts)

      yield* reply.keys
      cursor = reply.cursor
    } while (cursor !== START_CURSOR)
  }

  /** Every matching key, collected. */
  async collect(searchTerm = "", opts: ScanOptions = {}): Promise<string[]> {
    const out: string[] = []

    for await (const key of this.scan(searchTerm, opts)) out.push(key)

    return out
  }

  /**
   * First matching formatted key, or undefined.
   *
   * Pages of COUNT 1 can come back empty while the cursor is still
   * running, so pages are followed until a key shows up or the scan ends.
   */
  async first(searchTerm = "", operation = "first"): Promise<string | undefined> {
    const scan = this.scanFn(operation)
    const scanOpts: StoreScanOptions = { MATCH: this.deps.keys.scanPattern(searchTerm), COUNT: 1 }

    let cursor = START_CURSOR

    do {
      const reply = await scan(cursor, scanOpts)
      const [key] = reply.keys

      if (key !== undefined) return key
      cursor = reply.cursor
    } while (cursor !== START_CURSOR)

    return undefined
  }

  private scanFn(operation: string): ScanFn {
    const { client } = this.deps
    const scan = client.scan?.bind(client)

    if (!scan) throw new UnsupportedError(operation)

    return scan
  }
}
