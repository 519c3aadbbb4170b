import { createHash } from "crypto";

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}` as const;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

function canonicalize(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    return value.map((v) => {
      const c = canonicalize(v);
      return c === undefined ? null : c;
    });
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const c = canonicalize(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }
  return value;
}

/** JSON with object keys sorted, so equal values hash equally. */
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
