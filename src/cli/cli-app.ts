/**
 * CLI App - Commander.js setup
 */

import { Command } from "commander";

import { loadConfig } from "../config.js";
import { deleteTask, listTasks, showTask } from "./commands/tasks.js";
import { send } from "./commands/send.js";
import { serve } from "./commands/serve.js";
import { withErrorHandling } from "./error-handler.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("taskboard")
    .description("Conversational task orchestration service")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to taskboard.config.json")
    .option("--json", "Output in JSON format")
    .option("-q, --quiet", "Suppress non-essential output")
    .option("--verbose", "Show error details");

  // read at failure time, after commander has parsed the flags
  const handling = { verbose: () => program.opts<{ verbose?: boolean }>().verbose === true };

  program
    .command("serve")
    .description("Start the HTTP gateway")
    .option("-p, --port <port>", "Override gateway.port")
    .action(
      withErrorHandling(async (options: { port?: string }, cmd: Command) => {
        const globals = cmd.optsWithGlobals<{ config?: string; quiet?: boolean }>();
        const cfg = await loadConfig(globals.config);
        await serve(cfg, { ...options, quiet: globals.quiet });
      }, handling),
    );

  program
    .command("send <message>")
    .description("Send a message, starting a new task or continuing one")
    .option("-t, --task <id>", "Task to continue")
    .action(
      withErrorHandling(async (message: string, options: { task?: string }, cmd: Command) => {
        const globals = cmd.optsWithGlobals<{ config?: string; json?: boolean; quiet?: boolean }>();
        const cfg = await loadConfig(globals.config);
        await send(cfg, message, { ...options, json: globals.json, quiet: globals.quiet });
      }, handling),
    );

  program
    .command("list")
    .description("List task ids")
    .action(
      withErrorHandling(async (_options: unknown, cmd: Command) => {
        const globals = cmd.optsWithGlobals<{ config?: string; json?: boolean; quiet?: boolean }>();
        const cfg = await loadConfig(globals.config);
        await listTasks(cfg, globals);
      }, handling),
    );

  program
    .command("show <id>")
    .description("Show a task's messages and status")
    .action(
      withErrorHandling(async (id: string, _options: unknown, cmd: Command) => {
        const globals = cmd.optsWithGlobals<{ config?: string; json?: boolean; quiet?: boolean }>();
        const cfg = await loadConfig(globals.config);
        await showTask(cfg, id, globals);
      }, handling),
    );

  program
    .command("delete <id>")
    .description("Delete a task")
    .action(
      withErrorHandling(async (id: string, _options: unknown, cmd: Command) => {
        const globals = cmd.optsWithGlobals<{ config?: string; json?: boolean; quiet?: boolean }>();
        const cfg = await loadConfig(globals.config);
        await deleteTask(cfg, id, globals);
      }, handling),
    );

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
