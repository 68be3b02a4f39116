/**
 * Human-readable durations for stage and total build timing
 */

/**
 * Format the span between two millisecond timestamps
 *
 * Hours appear only when non-zero, minutes when either minutes or hours
 * are non-zero; seconds always appear with millisecond precision.
 *
 * @example
 * ```typescript
 * formatElapsed(0, 1_500);     // "1.500s"
 * formatElapsed(0, 61_000);    // "1m1.000s"
 * formatElapsed(0, 3_600_000); // "1h0m0.000s"
 * ```
 */
export function formatElapsed(startMs: number, endMs: number): string {
  const totalMs = Math.max(0, Math.round(endMs - startMs));

  const millis = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const seconds = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);

  let out = "";
  if (hours > 0) out += `${hours}h`;
  if (minutes > 0 || hours > 0) out += `${minutes}m`;
  out += `${seconds}.${String(millis).padStart(3, "0")}s`;
  return out;
}

/**
 * Captures a start time and reports elapsed time since it
 */
export class Stopwatch {
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  elapsed(): string {
    return formatElapsed(this.startedAt, this.now());
  }
}
