import { isDuration, type Duration } from "../core/duration.js";

export type GresSpec = string | readonly [name: string, count: number] | readonly [name: string, count: number, type: string];
export type LicenseSpec = string | readonly [name: string, count: number];

export interface NodeRange {
  readonly kind: "node_range";
  readonly min: number;
  readonly max: number | null;
}

export interface SignalSpec {
  readonly kind: "signal";
  readonly signal: string | number;
  readonly seconds: number | null;
  readonly shellOnly: boolean;
}

export type SwitchesSpec = number | readonly [count: number, maxWait: Duration];

export const BEGIN_TOKENS = ["now", "today", "tomorrow", "midnight", "noon", "fika", "teatime"] as const;
export type BeginToken = (typeof BEGIN_TOKENS)[number];
export type BeginSpec = Date | Duration | BeginToken;

export type OpenMode = "w" | "a";
export type ExclusiveMode = true | "user" | "mcs";
export type ExportVars = "ALL" | "NONE" | readonly string[];

export interface ExportSpec {
  readonly kind: "export";
  readonly vars: ExportVars | null;
  readonly assignments: ReadonlyArray<readonly [name: string, value: string]>;
}

export const MAIL_TYPES = [
  "NONE",
  "BEGIN",
  "END",
  "FAIL",
  "REQUEUE",
  "ALL",
  "INVALID_DEPEND",
  "STAGE_OUT",
  "TIME_LIMIT",
  "TIME_LIMIT_90",
  "TIME_LIMIT_80",
  "TIME_LIMIT_50",
  "ARRAY_TASKS"
] as const;
export type MailType = (typeof MAIL_TYPES)[number];

export type OptionValue =
  | true
  | number
  | string
  | Date
  | Duration
  | NodeRange
  | SignalSpec
  | ExportSpec
  | readonly [count: number, maxWait: Duration]
  | readonly GresSpec[]
  | readonly LicenseSpec[];

/** Runtime shape check for values arriving through an untyped container. */
export interface ValueKind<T> {
  expected: string;
  is(raw: unknown): raw is T;
}

function isName(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isNodeRange(value: unknown): value is NodeRange {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "node_range";
}

export function isSignalSpec(value: unknown): value is SignalSpec {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "signal";
}

export function isExportSpec(value: unknown): value is ExportSpec {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "export";
}

export function isGresSpec(value: unknown): value is GresSpec {
  if (isName(value)) return true;
  if (!Array.isArray(value)) return false;
  if (value.length === 2) return isName(value[0]) && typeof value[1] === "number";
  if (value.length === 3) return isName(value[0]) && typeof value[1] === "number" && isName(value[2]);
  return false;
}

export function isLicenseSpec(value: unknown): value is LicenseSpec {
  if (isName(value)) return true;
  return Array.isArray(value) && value.length === 2 && isName(value[0]) && typeof value[1] === "number";
}

export function isSwitchesTuple(value: unknown): value is readonly [number, Duration] {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "number" && isDuration(value[1]);
}

export function isSwitchesSpec(value: unknown): value is SwitchesSpec {
  return typeof value === "number" || isSwitchesTuple(value);
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export function isBeginToken(value: unknown): value is BeginToken {
  return BEGIN_TOKENS.some((token) => token === value);
}

export const kinds = {
  flag: {
    expected: "a boolean",
    is: (raw: unknown): raw is true => raw === true
  } satisfies ValueKind<true>,
  integer: {
    expected: "an integer",
    is: (raw: unknown): raw is number => typeof raw === "number" && Number.isInteger(raw)
  } satisfies ValueKind<number>,
  text: {
    expected: "a string",
    is: (raw: unknown): raw is string => typeof raw === "string"
  } satisfies ValueKind<string>,
  memory: {
    expected: "an integer or a size string",
    is: (raw: unknown): raw is number | string =>
      typeof raw === "string" || (typeof raw === "number" && Number.isInteger(raw))
  } satisfies ValueKind<number | string>,
  duration: {
    expected: "a duration",
    is: isDuration
  } satisfies ValueKind<Duration>,
  date: {
    expected: "a valid Date",
    is: isValidDate
  } satisfies ValueKind<Date>,
  textList: {
    expected: "a list of strings",
    is: (raw: unknown): raw is readonly string[] => Array.isArray(raw) && raw.every((v) => typeof v === "string")
  } satisfies ValueKind<readonly string[]>,
  gresList: {
    expected: "a list of gres specs",
    is: (raw: unknown): raw is readonly GresSpec[] => Array.isArray(raw) && raw.every(isGresSpec)
  } satisfies ValueKind<readonly GresSpec[]>,
  licenseList: {
    expected: "a list of license specs",
    is: (raw: unknown): raw is readonly LicenseSpec[] => Array.isArray(raw) && raw.every(isLicenseSpec)
  } satisfies ValueKind<readonly LicenseSpec[]>,
  switches: {
    expected: "a count or a [count, maxWait] pair",
    is: isSwitchesSpec
  } satisfies ValueKind<SwitchesSpec>
};
