/**
 * Output Formatter - CLI output with colors using chalk
 */

import chalk from "chalk";

import type { Task } from "../board/types.js";

export type OutputLevel = "info" | "success" | "warning" | "error";

export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;

  constructor(options: { quiet?: boolean; noColor?: boolean } = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
  }

  print(message: string, level: OutputLevel = "info"): void {
    if (this.quiet && level !== "error") return;
    const styled = this.noColor ? message : this.style(message, level);
    const stream = level === "error" ? process.stderr : process.stdout;
    stream.write(styled + "\n");
  }

  success(message: string): void {
    this.print(message, "success");
  }

  warn(message: string): void {
    this.print(message, "warning");
  }

  keyValue(key: string, value: string | number): void {
    if (this.quiet) return;
    const formattedKey = this.noColor ? `${key}:` : chalk.dim(`${key}:`);
    process.stdout.write(`${formattedKey} ${value}\n`);
  }

  json(data: unknown): void {
    process.stdout.write(JSON.stringify(data, null, 2) + "\n");
  }

  /** Prints a task as a transcript, newest message last. */
  task(task: Task): void {
    this.keyValue("task", task.id);
    this.keyValue("status", task.status ?? "-");
    for (const message of task.messages) {
      const label = message.type === "user" ? "you" : "assistant";
      const styledLabel = this.noColor ? `${label}>` : message.type === "user" ? chalk.cyan(`${label}>`) : chalk.green(`${label}>`);
      if (!this.quiet) process.stdout.write(`${styledLabel} ${message.content}\n`);
    }
  }

  private style(message: string, level: OutputLevel): string {
    switch (level) {
      case "success":
        return chalk.green(message);
      case "warning":
        return chalk.yellow(message);
      case "error":
        return chalk.red(message);
      default:
        return message;
    }
  }
}
