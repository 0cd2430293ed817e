import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { AttachmentFile } from "@repo/rocketchat-api";
import type { Command } from "commander";
import { InvalidArgumentError } from "commander";
import { runWithClients } from "./shared.js";

export function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit <= 0 || String(limit) !== value.trim()) {
    throw new InvalidArgumentError("limit must be a positive integer");
  }
  return limit;
}

async function readAttachment(path: string): Promise<AttachmentFile> {
  const content = await readFile(path);
  return { name: basename(path), data: new Blob([content]) };
}

export function registerMessagesCommand(program: Command): void {
  const messages = program.command("messages").description("Rocket.Chat messages");

  messages
    .command("list <roomId>")
    .description("List messages of a channel")
    .option("-l, --limit <count>", "Number of messages", parseLimit, 50)
    .action(async (roomId: string, options: { limit: number }) => {
      await runWithClients(({ messages }) => messages.getMessages(roomId, options.limit));
    });

  messages
    .command("send <roomId> <text>")
    .description("Send a message (only the first --file is uploaded)")
    .option("-f, --file <paths...>", "Files to attach")
    .action(async (roomId: string, text: string, options: { file?: string[] }) => {
      await runWithClients(async ({ messages }) => {
        const files = await Promise.all((options.file ?? []).map(readAttachment));
        return messages.sendMessageWithAttachment(roomId, text, files);
      });
    });

  messages
    .command("search <text>")
    .description("Search messages, optionally within one room")
    .option("-r, --room <roomId>", "Room to search in")
    .action(async (text: string, options: { room?: string }) => {
      await runWithClients(({ messages }) => messages.searchMessages(text, options.room ?? null));
    });
}
