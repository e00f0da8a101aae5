// Program root: wires subcommands and parses args.

import { Command } from "commander";
import { makeSyncCommand, type CommandEnv } from "./sync-command.ts";

export function makeProgram(ctx: CommandEnv = {}): Command {
  return new Command()
    .name("doctree-sync")
    .description("Keep a docs directory and its documentation server topics in step")
    .addCommand(makeSyncCommand("sync", ctx), { isDefault: true })
    .addCommand(makeSyncCommand("reconcile", ctx))
    .addCommand(makeSyncCommand("migrate", ctx));
}

export async function main(argv: string[] = process.argv.slice(2), ctx: CommandEnv = {}): Promise<void> {
  await makeProgram(ctx).parseAsync(argv, { from: "user" });
}
