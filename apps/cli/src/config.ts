import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";

export interface RcfConfig {
  rocketchat: {
    /** REST API base URL (例: https://chat.example.com/api/v1) */
    url?: string;
    username?: string;
    password?: string;
    /** upstream 呼び出し 1 回あたりのタイムアウト (ms) */
    timeoutMs: number;
  };
  server: {
    port: number;
  };
}

const RCF_HOME = join(homedir(), ".rcf");
const CONFIG_PATH = join(RCF_HOME, "config.json");

const defaultConfig: RcfConfig = {
  rocketchat: {
    url: undefined,
    username: undefined,
    password: undefined,
    timeoutMs: 30000,
  },
  server: {
    port: 3001,
  },
};

/** config.json のスキーマ (全項目任意) */
const userConfigSchema = z.object({
  rocketchat: z
    .object({
      url: z.string().url(),
      username: z.string(),
      password: z.string(),
      timeoutMs: z.number().int().positive(),
    })
    .partial()
    .optional(),
  server: z
    .object({
      port: z.number().int().min(1).max(65535),
    })
    .partial()
    .optional(),
});

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function loadConfig(
  configPath: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): RcfConfig {
  if (!existsSync(configPath)) {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(defaultConfig, null, 2));
    return applyEnvOverrides(structuredClone(defaultConfig), env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON`, { cause: error });
  }

  const parsed = userConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${configPath}: ${issue.path.join(".")} ${issue.message}`, {
      cause: parsed.error,
    });
  }
  const userConfig = parsed.data;

  const merged: RcfConfig = {
    rocketchat: { ...defaultConfig.rocketchat, ...userConfig.rocketchat },
    server: { ...defaultConfig.server, ...userConfig.server },
  };

  return applyEnvOverrides(merged, env);
}

/**
 * 環境変数から接続情報等を上書きする。
 * 環境変数が設定されていれば優先、なければ config.json の値を使用。
 */
function applyEnvOverrides(config: RcfConfig, env: NodeJS.ProcessEnv): RcfConfig {
  if (env.ROCKETCHAT_URL) {
    config.rocketchat.url = env.ROCKETCHAT_URL;
  }
  if (env.ROCKETCHAT_USER) {
    config.rocketchat.username = env.ROCKETCHAT_USER;
  }
  if (env.ROCKETCHAT_PASSWORD) {
    config.rocketchat.password = env.ROCKETCHAT_PASSWORD;
  }
  if (env.RCF_PORT) {
    const port = Number.parseInt(env.RCF_PORT, 10);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`RCF_PORT must be a port number, got "${env.RCF_PORT}"`);
    }
    config.server.port = port;
  }

  return config;
}
