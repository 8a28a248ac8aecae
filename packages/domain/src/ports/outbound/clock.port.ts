export interface ClockPort {
  /** Wall-clock time, used for datapoint timestamps. */
  now(): Date;
  /** Monotonic milliseconds, used for elapsed-time measurement. */
  monotonicMs(): number;
  /** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
