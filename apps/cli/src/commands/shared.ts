import type { RocketChatClients } from "@repo/rocketchat-api";
import { setupFileLogger } from "@repo/core";
import { createRocketChatClients } from "@repo/rocketchat-api";
import consola from "consola";
import type { RcfConfig } from "../config.js";
import { getConfigPath, loadConfig } from "../config.js";

/**
 * 設定から Rocket.Chat クライアントを作成する。接続情報が不足していれば終了
 */
export function requireClients(config: RcfConfig): RocketChatClients {
  const clients = createRocketChatClients(config.rocketchat);
  if (!clients) {
    consola.error(
      `Rocket.Chat url, username and password are required. Set them in ${getConfigPath()} or via ROCKETCHAT_URL / ROCKETCHAT_USER / ROCKETCHAT_PASSWORD`,
    );
    process.exit(1);
  }
  return clients;
}

/**
 * ワンショットコマンドの実行: 結果を JSON で出力し、失敗時は exit code 1
 */
export async function runWithClients(
  task: (clients: RocketChatClients) => Promise<unknown>,
): Promise<void> {
  setupFileLogger("cli");
  const clients = requireClients(loadConfig());

  try {
    const result = await task(clients);
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } catch (error) {
    consola.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
