/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";
import { ZodError } from "zod";

export class CliError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: { code: string; details?: Record<string, unknown>; suggestion?: string } = { code: "CLI_ERROR" },
  ) {
    super(message);
    this.name = "CliError";
    this.code = options.code;
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "CONFIG_ERROR", suggestion });
    this.name = "ConfigError";
  }
}

/**
 * Gateway unreachable or answering with an error
 */
export class ConnectionError extends CliError {
  constructor(message: string, options: { suggestion?: string; details?: Record<string, unknown> } = {}) {
    super(message, { code: "CONNECTION_ERROR", ...options });
    this.name = "ConnectionError";
  }
}

export class ValidationError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "VALIDATION_ERROR", suggestion });
    this.name = "ValidationError";
  }
}

const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check your taskboard.config.json file for issues.",
  },
  CONNECTION_ERROR: {
    title: "Connection Error",
    help: "Make sure the gateway is running with 'taskboard serve'.",
  },
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'taskboard --help' for usage information.",
  },
};

export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof CliError) {
    const meta = ERROR_MESSAGES[err.code] ?? ERROR_MESSAGES.CLI_ERROR;
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }
    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof ZodError) {
    lines.push(chalk.red.bold("Configuration Error: ") + "invalid config");
    for (const issue of err.issues) {
      lines.push(chalk.dim(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);
    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler with error handling
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: () => boolean } = {},
): (...args: T) => Promise<R | undefined> {
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      console.error(formatError(err, options.verbose?.() ?? false));
      process.exitCode = 1;
      return undefined;
    }
  };
}
