import * as z from "zod/v4";
import type { Duration } from "../core/duration.js";
import {
  isBeginToken,
  isGresSpec,
  isLicenseSpec,
  isValidDate,
  MAIL_TYPES,
  type BeginSpec,
  type GresSpec,
  type LicenseSpec,
  type SwitchesSpec
} from "./values.js";

export interface Rule<T> {
  check(value: T): boolean;
  message: string;
}

export function rule<T>(check: (value: T) => boolean, message: string): Rule<T> {
  return { check, message };
}

export function eachOf<T>(inner: Rule<T>): Rule<readonly T[]> {
  return rule((values) => values.every((v) => inner.check(v)), inner.message);
}

export function matches(pattern: RegExp, message: string): Rule<string> {
  return rule((value) => pattern.test(value), message);
}

export function oneOf<T extends string>(values: readonly T[], what: string): Rule<string> {
  return rule((value) => values.some((v) => v === value), `${what} must be one of ${values.join(", ")}`);
}

export const positive = rule<number>((n) => Number.isInteger(n) && n > 0, "value must be a positive integer");

export const nonNegative = rule<number>((n) => Number.isInteger(n) && n >= 0, "value must be a non-negative integer");

export const nonNegativeDuration = rule<Duration>(
  (d) => Number.isFinite(d.seconds) && d.seconds >= 0,
  "duration must be non-negative"
);

export const nonEmpty = rule<string>((s) => s.length > 0, "value must not be empty");

export const singleLine = rule<string>((s) => !/[\r\n]/.test(s), "value must not contain line breaks");

export const nonEmptyList = rule<readonly unknown[]>((list) => list.length > 0, "list must not be empty");

export const listEntries = eachOf(
  rule<string>((s) => s.length > 0 && !/[,\r\n]/.test(s), "list entries must be non-empty and free of commas and line breaks")
);

export const envVarName = matches(/^[A-Za-z_][A-Za-z0-9_]*$/, "invalid environment variable name");

export const memorySize = rule<number | string>(
  (v) => (typeof v === "number" ? Number.isInteger(v) && v > 0 : /^\d+[KMGT]$/.test(v)),
  "memory size must be a positive integer or a string of the form <digits>[K|M|G|T]"
);

export const reservationName = matches(/^[a-z0-9_-]*$/, "reservation name must match [a-z0-9_-]*");

export const emailAddress = rule<string>((v) => z.email().safeParse(v).success, "invalid e-mail address");

export const mailTypes = eachOf(oneOf(MAIL_TYPES, "mail type"));

const FEATURE = String.raw`[A-Za-z0-9_.\-]+(?:\*\d+)?`;
const CONSTRAINT_GRAMMARS = [
  new RegExp(`^${FEATURE}(?:,${FEATURE})*$`),
  new RegExp(`^${FEATURE}(?:\\|${FEATURE})*$`),
  new RegExp(`^${FEATURE}(?:&${FEATURE})*$`),
  new RegExp(`^\\[${FEATURE}(?:\\|${FEATURE})*\\]$`)
];

export const constraintExpression = rule<string>(
  (v) => CONSTRAINT_GRAMMARS.some((re) => re.test(v)),
  "invalid constraint expression"
);

const FILENAME_PLACEHOLDER = /%\d*[%AaJjNnstux]/g;

export function isValidFilenamePattern(pattern: string): boolean {
  if (pattern.includes("\\%")) return true;
  return !pattern.replace(FILENAME_PLACEHOLDER, "").includes("%");
}

export const filenamePattern = rule<string>(isValidFilenamePattern, "invalid filename pattern");

const GRES_NAME = /^[A-Za-z0-9_.\-]+$/;

export const gresSpecs = eachOf(
  rule<GresSpec>((spec) => {
    if (!isGresSpec(spec)) return false;
    if (typeof spec === "string") return GRES_NAME.test(spec);
    if (!GRES_NAME.test(spec[0]) || !positive.check(spec[1])) return false;
    return spec.length === 2 || GRES_NAME.test(spec[2]);
  }, "gres must be a name, a (name, count) or a (name, count, type) tuple")
);

export const licenseSpecs = eachOf(
  rule<LicenseSpec>((spec) => {
    if (!isLicenseSpec(spec)) return false;
    if (typeof spec === "string") return GRES_NAME.test(spec);
    return GRES_NAME.test(spec[0]) && positive.check(spec[1]);
  }, "license must be a name or a (name, count) tuple")
);

export const switchesSpec = rule<SwitchesSpec>(
  (spec) => (typeof spec === "number" ? positive.check(spec) : positive.check(spec[0]) && nonNegativeDuration.check(spec[1])),
  "switches must be a positive count or a (count, max-wait) pair with a non-negative max-wait"
);

export const beginSpec = rule<BeginSpec>((spec) => {
  if (typeof spec === "string") return isBeginToken(spec);
  if (spec instanceof Date) return isValidDate(spec);
  return nonNegativeDuration.check(spec);
}, "begin must be a date, a non-negative duration or one of now, today, tomorrow, midnight, noon, fika, teatime");
