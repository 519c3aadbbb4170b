import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { expandEnvToken, KitSettings } from "../src/config/config.js";

describe("KitSettings", () => {
  afterEach(() => {
    delete process.env.SBATCHKIT_TEST_SBATCH;
  });

  it("loads the default config and enforces the tool allowlist", async () => {
    const settings = await KitSettings.loadFromFile(path.resolve("config/sbatchkit.yaml"));
    expect(() => settings.assertToolAllowed("job_render")).not.toThrow();
    expect(() => settings.assertToolAllowed("definitely_not_allowed")).toThrow(McpError);
    expect(settings.interpreter()).toBe("/bin/bash");
    expect(settings.maxBodyBytes()).toBe(262144);
    expect(settings.configHash).toMatch(/^sha256:[a-f0-9]{64}$/);
  });

  it("denies tools with InvalidRequest", () => {
    const settings = new KitSettings({ version: 1, gateway: { tool_allowlist: [] } });
    try {
      settings.assertToolAllowed("job_submit");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(McpError);
      expect(e instanceof McpError && e.code).toBe(ErrorCode.InvalidRequest);
    }
  });

  it("expands environment tokens and falls back to defaults", async () => {
    process.env.SBATCHKIT_TEST_SBATCH = "/opt/slurm/bin/sbatch";
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "sbatchkit-"));
    try {
      const file = path.join(tmpDir, "config.yaml");
      await writeFile(
        file,
        [
          "version: 1",
          "sbatch:",
          "  path: ${SBATCHKIT_TEST_SBATCH}",
          "  extra_args: [--cluster=alpha]",
          "gateway:",
          "  tool_allowlist: [job_render]",
          ""
        ].join("\n")
      );
      const settings = await KitSettings.loadFromFile(file);
      expect(settings.sbatchPath()).toBe("/opt/slurm/bin/sbatch");
      expect(settings.sbatchExtraArgs()).toEqual(["--cluster=alpha"]);
      expect(settings.interpreter()).toBeNull();
      expect(settings.maxBodyBytes()).toBe(256 * 1024);
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("treats an unset variable as absent", () => {
    expect(expandEnvToken("$SBATCHKIT_TEST_SBATCH")).toBeNull();
    expect(expandEnvToken("/usr/bin/sbatch")).toBe("/usr/bin/sbatch");
    const settings = KitSettings.fromYaml(
      ["version: 1", "sbatch:", "  path: ${SBATCHKIT_TEST_SBATCH}", "gateway:", "  tool_allowlist: []"].join("\n")
    );
    expect(settings.sbatchPath()).toBeNull();
  });

  it("rejects malformed configs", () => {
    expect(() => KitSettings.fromYaml("version: 1\n", "broken.yaml")).toThrow(/^invalid config at broken\.yaml: gateway/);
  });
});
