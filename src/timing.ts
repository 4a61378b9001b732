export type SleepFn = (ms: number) => Promise<void>;

export type ClockFn = () => number;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
