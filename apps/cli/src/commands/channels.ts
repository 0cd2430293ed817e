import type { Command } from "commander";
import { runWithClients } from "./shared.js";

export function parseMembers(value: string): string[] {
  return value
    .split(",")
    .map((member) => member.trim())
    .filter((member) => member.length > 0);
}

export function registerChannelsCommand(program: Command): void {
  const channels = program.command("channels").description("Rocket.Chat channels");

  channels
    .command("list")
    .description("List public channels")
    .action(async () => {
      await runWithClients(({ rooms }) => rooms.listPublicChannels());
    });

  channels
    .command("info <roomId>")
    .description("Show channel info")
    .action(async (roomId: string) => {
      await runWithClients(({ rooms }) => rooms.getChannelInfo(roomId));
    });

  channels
    .command("create <name>")
    .description("Create a public channel")
    .option("--members <usernames>", "Comma separated usernames", parseMembers, [])
    .option("--read-only", "Create a read-only channel", false)
    .option("--description <text>", "Channel description")
    .action(
      async (
        name: string,
        options: { members: string[]; readOnly: boolean; description?: string },
      ) => {
        await runWithClients(({ rooms }) =>
          rooms.createChannel(name, options.members, options.readOnly, options.description),
        );
      },
    );
}
