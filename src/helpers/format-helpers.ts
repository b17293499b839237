/**
 * Converts a speed in metres per second to a per-kilometre pace, "M:SS".
 * Returns "N/A" for zero or negative speeds.
 */
export function formatPace(speedMps: number): string {
  if (!(speedMps > 0)) return "N/A";
  const secondsPerKm = Math.round(1000 / speedMps);
  const mins = Math.floor(secondsPerKm / 60);
  const secs = secondsPerKm % 60;
  return `${mins}:${String(secs).padStart(2, "0")}`;
}

/** Seconds as "H:MM:SS", or "M:SS" under an hour. */
export function formatDuration(seconds: number): string {
  const total = Math.trunc(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const ss = String(secs).padStart(2, "0");
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Pace of a distance/time pair, "N/A" unless both are positive. */
export function paceFrom(distanceMetres: number | undefined, movingSeconds: number | undefined): string {
  const distance = distanceMetres ?? 0;
  const time = movingSeconds ?? 0;
  if (distance > 0 && time > 0) {
    return formatPace(distance / time);
  }
  return "N/A";
}
