export const HTTP_FETCH = 'HTTP_FETCH';
export const SLEEP = 'SLEEP';

export type FetchFn = typeof fetch;
export type SleepFn = (ms: number) => Promise<void>;

// Bound wrapper so the client never calls fetch with a foreign `this`
export const nodeFetch: FetchFn = (input, init) => fetch(input, init);

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
