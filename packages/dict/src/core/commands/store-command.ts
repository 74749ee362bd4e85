import type { StoreSetOptions } from "../../ports/store-client"

export type SetCommand = {
  readonly name: "SET"
  readonly key: string
  readonly value: string
  readonly options: StoreSetOptions
}

export type DelCommand = {
  readonly name: "DEL"
  readonly keys: readonly string[]
}

export type GetDelCommand = {
  readonly name: "GETDEL"
  readonly key: string
}

export type StoreCommand = SetCommand | DelCommand | GetDelCommand

export type ToArgsOptions = {
  /** Replace SET values with their byte length. @default true */
  elideValue?: boolean
}

/**
 * Renders a command as the argument vector the store receives.
 *
 * @example
 * toArgs({ name: "SET", key: "main:foo", value: "integer:1", options: { NX: true, GET: true, EX: 10 } })
 * // ["SET", "main:foo", "<9 bytes>", "NX", "GET", "EX", "10"]
 */
export function toArgs(command: StoreCommand, opts: ToArgsOptions = {}): string[] {
  switch (command.name) {
    case "GETDEL":
      return ["GETDEL", command.key]
    case "DEL":
      return ["DEL", ...command.keys]
    case "SET": {
      const { value, options } = command
      const args = [
        "SET",
        command.key,
        opts.elideValue === false ? value : `<${Buffer.byteLength(value, "utf8")} bytes>`,
      ]

      if (options.NX) args.push("NX")
      if (options.GET) args.push("GET")
      if (options.EX !== undefined) args.push("EX", String(options.EX))
      if (options.KEEPTTL) args.push("KEEPTTL")

      return args
    }
  }
}
