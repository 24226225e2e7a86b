import type { Command } from 'commander';
import { formatTable } from './util/table.js';
import { CliError, errorCode } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

/** Non-essential text; silenced by --quiet. */
export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

/** The one line a command exists to print; --quiet keeps it. */
export function printResult(message: string): void {
  console.log(message);
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

function jsonSafe(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, jsonSafe, 2));
}

export function printHumanTable(
  columns: readonly string[],
  rows: readonly Record<string, unknown>[],
  output: OutputOptions,
): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const message = error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = { ok: false, code: errorCode(error), message };
    if (output.debug) {
      payload.details =
        error instanceof CliError
          ? error.details ?? null
          : error instanceof Error
            ? { stack: error.stack }
            : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (error instanceof CliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, jsonSafe, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}
