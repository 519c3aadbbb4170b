export interface Duration {
  readonly kind: "duration";
  readonly seconds: number;
}

export interface DurationParts {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}

export function duration(parts: DurationParts | number): Duration {
  if (typeof parts === "number") return { kind: "duration", seconds: parts };
  const seconds =
    (parts.days ?? 0) * 86400 + (parts.hours ?? 0) * 3600 + (parts.minutes ?? 0) * 60 + (parts.seconds ?? 0);
  return { kind: "duration", seconds };
}

export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "duration" &&
    "seconds" in value &&
    typeof value.seconds === "number"
  );
}

/**
 * sbatch time format: `MM:SS` below one hour, `HH:MM:SS` below one day and
 * `D-HH:MM:SS` above. Fractional seconds are dropped.
 */
export function formatSlurmDuration(d: Duration): string {
  const total = Math.floor(d.seconds);
  if (!Number.isFinite(total) || total < 0) throw new Error(`invalid duration: ${d.seconds}s`);

  const days = Math.floor(total / 86400);
  const rem = total - days * 86400;
  const hours = Math.floor(rem / 3600);
  const rem2 = rem - hours * 3600;
  const minutes = Math.floor(rem2 / 60);
  const secs = rem2 - minutes * 60;

  const hh = String(hours).padStart(2, "0");
  const mm = String(minutes).padStart(2, "0");
  const ss = String(secs).padStart(2, "0");

  if (days > 0) return `${days}-${hh}:${mm}:${ss}`;
  if (hours > 0) return `${hh}:${mm}:${ss}`;
  return `${mm}:${ss}`;
}
