export { delay, monotonicClock, waitForReady } from "./waiter";
export type { Clock, Probe, Sleep, WaitOptions, WaitResult } from "./waiter";
