#!/usr/bin/env tsx
import { Command } from "commander";
import consola from "consola";
import { registerChannelsCommand } from "./commands/channels.js";
import { registerLoginCommand } from "./commands/login.js";
import { registerMessagesCommand } from "./commands/messages.js";
import { registerServeCommand } from "./commands/serve.js";

const program = new Command();

program
  .name("rcf")
  .description("Rocket.Chat facade - simplified REST API over Rocket.Chat")
  .version("0.1.0");

registerServeCommand(program);
registerLoginCommand(program);
registerChannelsCommand(program);
registerMessagesCommand(program);

try {
  await program.parseAsync();
} catch (error) {
  consola.error(error);
  process.exitCode = 1;
}
