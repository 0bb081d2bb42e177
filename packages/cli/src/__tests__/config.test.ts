import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CliConfigError, loadCliConfig } from "../config.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gatewire-cli-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadCliConfig", () => {
  it("returns an empty config when no config file exists", () => {
    const projectRoot = makeTempDir();
    const loaded = loadCliConfig(projectRoot, {});

    expect(loaded.configPath).toBeNull();
    expect(loaded.config).toEqual({});
  });

  it("reads gatewire.config.json and applies env overrides", () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(
      path.join(projectRoot, "gatewire.config.json"),
      JSON.stringify({ intents: 513, timing: { doctorGracePeriodMs: 2000 }, logLevel: "warn" })
    );
    const env: NodeJS.ProcessEnv = {
      GATEWIRE_LOG_LEVEL: "debug",
      GATEWIRE_INTENTS: "0x200",
      GATEWIRE_GATEWAY_URL: "wss://gateway.test"
    };

    const loaded = loadCliConfig(projectRoot, env);
    expect(loaded.configPath).toBe(path.join(projectRoot, "gatewire.config.json"));
    expect(loaded.config).toEqual({
      intents: 512,
      timing: { doctorGracePeriodMs: 2000 },
      logLevel: "debug",
      gatewayUrl: "wss://gateway.test"
    });
  });

  it("loads .env files without overriding shell variables", () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(path.join(projectRoot, ".env"), "DISCORD_BOT_TOKEN=from-file\nEXTRA=one\n");
    fs.writeFileSync(path.join(projectRoot, ".env.local"), "EXTRA=two\n");
    const env: NodeJS.ProcessEnv = { DISCORD_BOT_TOKEN: "test-secret" };

    loadCliConfig(projectRoot, env);
    expect(env.DISCORD_BOT_TOKEN).toBe("test-secret");
    expect(env.EXTRA).toBe("two");
  });

  it("rejects unknown keys and invalid values", () => {
    const projectRoot = makeTempDir();
    const configPath = path.join(projectRoot, "gatewire.config.json");

    fs.writeFileSync(configPath, JSON.stringify({ timing: { stopTimeoutMs: 0 } }));
    expect(() => loadCliConfig(projectRoot, {})).toThrowError(
      "Invalid gatewire.config.json at timing.stopTimeoutMs: Number must be greater than 0"
    );

    fs.writeFileSync(configPath, JSON.stringify({ intents: 1 }));
    expect(() => loadCliConfig(projectRoot, { GATEWIRE_INTENTS: "lots" })).toThrowError(CliConfigError);
  });
});
