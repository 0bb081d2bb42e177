import fs from "node:fs";
import path from "node:path";
import type { GatewireConfig } from "@gatewire/core";
import { parse as parseDotEnv } from "dotenv";
import { z } from "zod";

export const CONFIG_FILE_NAME = "gatewire.config.json";

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  config: GatewireConfig;
}

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const configFileSchema = z
  .object({
    token: z.string().min(1).optional(),
    tokenEnvVar: z.string().min(1).optional(),
    intents: nonNegativeInt.optional(),
    identify: z
      .object({
        os: z.string().min(1).optional(),
        browser: z.string().min(1).optional(),
        device: z.string().min(1).optional()
      })
      .strict()
      .optional(),
    apiBaseUrl: z.string().url().optional(),
    apiVersion: positiveInt.optional(),
    gatewayUrl: z.string().url().optional(),
    timing: z
      .object({
        doctorPollIntervalMs: positiveInt.optional(),
        doctorGracePeriodMs: nonNegativeInt.optional(),
        stopTimeoutMs: positiveInt.optional(),
        stopPollIntervalMs: positiveInt.optional(),
        scheduleTimeoutMs: positiveInt.optional(),
        schedulePollIntervalMs: positiveInt.optional(),
        helloTimeoutMs: positiveInt.optional(),
        restartDelayMs: nonNegativeInt.optional()
      })
      .strict()
      .optional(),
    eventQueueCapacity: positiveInt.optional(),
    logLevel: z.string().min(1).optional()
  })
  .strict();

export class CliConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliConfigError";
  }
}

export function loadProjectEnvFiles(projectRoot: string, env: NodeJS.ProcessEnv = process.env): void {
  // Keep explicit shell/CI env vars authoritative over local files.
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    const parsed = parseDotEnv(fs.readFileSync(filePath, "utf8"));
    for (const [key, value] of Object.entries(parsed)) {
      merged[key] = value;
    }
  }

  for (const [key, value] of Object.entries(merged)) {
    if (shellDefined.has(key)) {
      continue;
    }
    env[key] = value;
  }
}

function readConfigFile(configPath: string): GatewireConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliConfigError(`Unable to read ${configPath}: ${message}`);
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new CliConfigError(`Invalid ${CONFIG_FILE_NAME} at ${where}: ${issue?.message ?? "unknown error"}`);
  }
  return parsed.data;
}

function parseIntents(raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new CliConfigError(`GATEWIRE_INTENTS must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function applyEnvOverrides(config: GatewireConfig, env: NodeJS.ProcessEnv): GatewireConfig {
  const logLevel = env.GATEWIRE_LOG_LEVEL?.trim();
  const intents = env.GATEWIRE_INTENTS?.trim();
  const gatewayUrl = env.GATEWIRE_GATEWAY_URL?.trim();
  return {
    ...config,
    ...(logLevel ? { logLevel } : {}),
    ...(intents ? { intents: parseIntents(intents) } : {}),
    ...(gatewayUrl ? { gatewayUrl } : {})
  };
}

export function loadCliConfig(projectRoot = process.cwd(), env: NodeJS.ProcessEnv = process.env): LoadedCliConfig {
  const resolvedRoot = path.resolve(projectRoot);
  loadProjectEnvFiles(resolvedRoot, env);

  const candidate = path.join(resolvedRoot, CONFIG_FILE_NAME);
  const configPath = fs.existsSync(candidate) && fs.statSync(candidate).isFile() ? candidate : null;
  const fileConfig = configPath ? readConfigFile(configPath) : {};

  return {
    projectRoot: resolvedRoot,
    configPath,
    config: applyEnvOverrides(fileConfig, env)
  };
}
