/**
 * Injectable delay. Retry loops take one of these instead of calling setTimeout
 * directly so tests can run backoff schedules without waiting.
 */
export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const noSleep: Sleep = () => Promise.resolve();
