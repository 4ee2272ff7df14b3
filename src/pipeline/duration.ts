/**
 * Short human-readable duration:
 *   7.25 -> "7.3s", 42.4 -> "42s", 125 -> "2m 5s", 120 -> "2m", 3720 -> "1h 2m", 3600 -> "1h"
 */
export function formatDuration(seconds: number): string {
  const s = Math.max(0, Number.isFinite(seconds) ? seconds : 0);
  if (s < 60) {
    return s < 10 ? `${s.toFixed(1)}s` : `${Math.round(s)}s`;
  }
  if (s < 3600) {
    const m = Math.floor(s / 60);
    const remS = Math.round(s - m * 60);
    return remS > 0 && remS < 60 ? `${m}m ${remS}s` : `${m}m`;
  }
  const h = Math.floor(s / 3600);
  const remM = Math.floor((s - h * 3600) / 60);
  return remM > 0 ? `${h}h ${remM}m` : `${h}h`;
}

/**
 * Result caption. The queue figure adds the local wait before a worker
 * picked the job up to the engine's own queue time.
 */
export function buildCaption(
  prompt: string,
  localQueueSeconds: number,
  engineQueueSeconds: number,
  execSeconds: number,
): string {
  const queue = formatDuration(Math.max(0, (localQueueSeconds || 0) + (engineQueueSeconds || 0)));
  const generation = formatDuration(execSeconds);
  const timings = `Queue: ${queue} | Generation: ${generation}`;
  return prompt ? `${prompt}\n\n${timings}` : timings;
}
