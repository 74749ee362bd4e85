/** Milliseconds since the Unix epoch, or a span in milliseconds. */
export type Milliseconds = number

/** A span in whole seconds, as used by store TTL commands. */
export type Seconds = number
