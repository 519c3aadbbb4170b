import { formatSlurmDuration, isDuration, type Duration } from "../core/duration.js";
import {
  isExportSpec,
  isGresSpec,
  isLicenseSpec,
  isNodeRange,
  isSignalSpec,
  isSwitchesTuple,
  isValidDate,
  type ExportSpec,
  type GresSpec,
  type LicenseSpec,
  type NodeRange,
  type OptionValue,
  type SignalSpec
} from "../options/values.js";

type Formatter = (value: OptionValue, name: string) => string;

function unexpected(name: string, value: unknown): never {
  throw new Error(`cannot render option '${name}' from value ${JSON.stringify(value)}`);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DDTHH:MM:SS`, the form sbatch parses. */
export function formatSlurmDate(d: Date): string {
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  return `${date}T${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export function formatBeginDuration(d: Duration): string {
  const seconds = Math.floor(d.seconds);
  if (seconds > 0 && seconds % 86400 === 0) return `now+${seconds / 86400}days`;
  return `now+${seconds}`;
}

function formatNodeRange(r: NodeRange): string {
  return r.max === null ? String(r.min) : `${r.min}-${r.max}`;
}

function formatGres(spec: GresSpec): string {
  if (typeof spec === "string") return spec;
  if (spec.length === 3) return `${spec[0]}:${spec[2]}:${spec[1]}`;
  return `${spec[0]}:${spec[1]}`;
}

function formatLicense(spec: LicenseSpec): string {
  return typeof spec === "string" ? spec : `${spec[0]}:${spec[1]}`;
}

function formatSignal(s: SignalSpec): string {
  return `${s.shellOnly ? "B:" : ""}${s.signal}${s.seconds === null ? "" : `@${s.seconds}`}`;
}

function formatExport(e: ExportSpec): string {
  const parts: string[] = [];
  if (e.vars !== null) parts.push(typeof e.vars === "string" ? e.vars : e.vars.join(","));
  for (const [k, v] of e.assignments) parts.push(`${k}=${v}`);
  return parts.join(",");
}

/** Type-driven rendering used for every option without a dedicated formatter. */
export function formatDefault(value: OptionValue): string {
  if (isDuration(value)) return formatSlurmDuration(value);
  if (isValidDate(value)) return formatSlurmDate(value);
  if (isNodeRange(value)) return formatNodeRange(value);
  if (isSignalSpec(value)) return formatSignal(value);
  if (isExportSpec(value)) return formatExport(value);
  if (Array.isArray(value)) return value.map((v) => String(v)).join(",");
  return String(value);
}

const FORMATTERS: Record<string, Formatter> = {
  gres: (value, name) => {
    if (!Array.isArray(value) || !value.every(isGresSpec)) return unexpected(name, value);
    return value.map(formatGres).join(",");
  },
  licenses: (value, name) => {
    if (!Array.isArray(value) || !value.every(isLicenseSpec)) return unexpected(name, value);
    return value.map(formatLicense).join(",");
  },
  begin: (value) => {
    if (isDuration(value)) return formatBeginDuration(value);
    return formatDefault(value);
  },
  switches: (value, name) => {
    if (typeof value === "number") return String(value);
    if (isSwitchesTuple(value)) return `${value[0]}@${formatSlurmDuration(value[1])}`;
    return unexpected(name, value);
  },
  "open-mode": (value, name) => {
    if (value === "w") return "truncate";
    if (value === "a") return "append";
    return unexpected(name, value);
  }
};

export function formatOptionValue(name: string, value: OptionValue): string {
  const formatter = FORMATTERS[name];
  return formatter ? formatter(value, name) : formatDefault(value);
}

/** One directive without the `#SBATCH ` prefix: `--name` for flags, `--name=value` otherwise. */
export function renderOption(name: string, value: OptionValue): string {
  if (value === true) return `--${name}`;
  return `--${name}=${formatOptionValue(name, value)}`;
}

export function renderDirective(name: string, value: OptionValue): string {
  return `#SBATCH ${renderOption(name, value)}`;
}
