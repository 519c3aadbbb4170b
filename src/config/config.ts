import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { sha256Prefixed, stableJsonStringify } from "../core/hash.js";

const DEFAULT_MAX_BODY_BYTES = 256 * 1024;

export const zKitConfig = z.object({
  version: z.number().int(),
  sbatch: z
    .object({
      path: z.string().optional(),
      extra_args: z.array(z.string()).optional()
    })
    .optional(),
  script: z
    .object({
      interpreter: z.string().optional()
    })
    .optional(),
  gateway: z.object({
    tool_allowlist: z.array(z.string()),
    max_body_bytes: z.number().int().positive().optional()
  })
});

export type KitConfig = z.infer<typeof zKitConfig>;

export function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

function expandConfigEnv(config: KitConfig): KitConfig {
  const sbatchPath = config.sbatch?.path === undefined ? null : expandEnvToken(config.sbatch.path);
  const interpreter = config.script?.interpreter === undefined ? null : expandEnvToken(config.script.interpreter);
  return {
    ...config,
    sbatch: config.sbatch ? { ...config.sbatch, path: sbatchPath ?? undefined } : undefined,
    script: config.script ? { ...config.script, interpreter: interpreter ?? undefined } : undefined
  };
}

export class KitSettings {
  readonly configHash: `sha256:${string}`;

  constructor(private readonly config: KitConfig) {
    this.configHash = sha256Prefixed(stableJsonStringify(config));
  }

  static async loadFromFile(filePath: string): Promise<KitSettings> {
    const raw = await fs.readFile(filePath, "utf8");
    return KitSettings.fromYaml(raw, filePath);
  }

  static fromYaml(raw: string, source = "<inline>"): KitSettings {
    const parsed = zKitConfig.safeParse(YAML.parse(raw));
    if (!parsed.success) {
      throw new Error(`invalid config at ${source}: ${parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`).join("; ")}`);
    }
    return new KitSettings(expandConfigEnv(parsed.data));
  }

  snapshot(): KitConfig {
    return structuredClone(this.config);
  }

  /** Explicit sbatch path, or null to search PATH. */
  sbatchPath(): string | null {
    return this.config.sbatch?.path ?? null;
  }

  sbatchExtraArgs(): string[] {
    return [...(this.config.sbatch?.extra_args ?? [])];
  }

  interpreter(): string | null {
    return this.config.script?.interpreter ?? null;
  }

  maxBodyBytes(): number {
    return this.config.gateway.max_body_bytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  assertToolAllowed(toolName: string): void {
    if (!this.config.gateway.tool_allowlist.includes(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `config denied tool: ${toolName}`);
    }
  }
}
