export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock } from "./ports/clock"
export { remainingSeconds, secondsToMs } from "./ports/clock"
export type * from "./ports/time"
