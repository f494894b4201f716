/**
 * Wall clock and process info.
 *
 * Snapshot ids, retention ages and lock metadata all come from here so tests can
 * pin time.
 */
export interface TimeClockPort {
  /** Unix epoch milliseconds. */
  nowMs(): number;
  getPid(): number;
}
