import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./cli/error-handler.js";

const DEFAULT_CONFIG_PATH = "taskboard.config.json";

const LevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const StoreSchema = z.object({
  type: z.enum(["memory", "file"]).default("memory"),
  dir: z.string().optional(),
});

const BoardSchema = z.object({
  mergeStrategy: z.enum(["atomic", "fetch-append"]).default("atomic"),
});

const GenerationSchema = z
  .object({
    type: z.enum(["flow", "openai"]).default("flow"),
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    flowPath: z.string().min(1).default("/chatFlow"),
    model: z.string().min(1).default("gpt-4o-mini"),
    systemPrompt: z.string().optional(),
    temperature: z.number().min(0).max(2).default(0.2),
    timeoutMs: z.number().int().positive().default(60_000),
  })
  .refine((value) => value.type !== "flow" || value.flowPath.startsWith("/"), {
    message: "generation.flowPath must start with '/'",
  });

const GatewaySchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65_535).default(8080),
});

const QueueSchema = z.object({
  warnAfterMs: z.number().int().positive().default(2_000),
});

const LoggingSchema = z.object({
  level: LevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LevelSchema.optional(),
});

export const ConfigSchema = z.object({
  stateDir: z.string().default(".taskboard"),
  store: StoreSchema.default({}),
  board: BoardSchema.default({}),
  generation: GenerationSchema,
  gateway: GatewaySchema.default({}),
  queue: QueueSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type TaskboardConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configDir: string;
    stateDir: string;
    storeDir: string;
    logFilePath?: string;
  };
};

export async function loadConfig(explicitPath?: string): Promise<TaskboardConfig> {
  const configPath = resolveConfigPath(explicitPath);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error && "code" in err && err.code === "ENOENT" ? "not found" : "unreadable";
    throw new ConfigError(`Config file ${reason}: ${configPath}`, "Create taskboard.config.json or pass --config");
  }
  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file is not valid JSON: ${configPath} (${detail})`, "Fix the JSON syntax in the config file");
  }
  return parseConfig(input, path.dirname(configPath));
}

export function parseConfig(input: unknown, baseDir = process.cwd()): TaskboardConfig {
  return resolveConfig(ConfigSchema.parse(input), baseDir);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.TASKBOARD_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return resolveUserPath(pathToUse);
}

function resolveConfig(base: z.infer<typeof ConfigSchema>, configDir: string): TaskboardConfig {
  const stateDir = resolveUserPath(base.stateDir, configDir);
  const storeDir = resolveUserPath(base.store.dir?.trim() || path.join(stateDir, "tasks"), configDir);
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, configDir)
    : undefined;

  return {
    ...base,
    resolved: {
      configDir,
      stateDir,
      storeDir,
      logFilePath,
    },
  };
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (trimmed === "~") return os.homedir();
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}
