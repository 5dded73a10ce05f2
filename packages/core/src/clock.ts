/** source of the current time, injectable for deterministic tests */
export interface Clock {
  /** current time as milliseconds since the unix epoch */
  now(): number;
}

/** clock backed by the system time */
export const systemClock: Clock = {
  now: () => Date.now(),
};
