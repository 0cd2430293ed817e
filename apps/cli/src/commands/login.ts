import type { Command } from "commander";
import { runWithClients } from "./shared.js";

export function registerLoginCommand(program: Command): void {
  program
    .command("login")
    .description("Log in to Rocket.Chat and print the account profile")
    .action(async () => {
      await runWithClients(async ({ session }) => {
        const result = await session.login();
        return { userId: result.userId, me: result.me };
      });
    });
}
