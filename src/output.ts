import type { CommanderError } from "commander";

import { FicpackError, type FicpackErrorCode } from "./errors.js";

/** commander's own parse errors, e.g. "commander.unknownCommand". */
export type CommanderErrorCode = `commander.${string}`;

export type CliErrorCode = FicpackErrorCode | CommanderErrorCode;

export type CliOk = {
  ok: true;
  command: string;
  data: Record<string, unknown>;
};

export type CliErr = {
  ok: false;
  command: string;
  error: { message: string; code?: CliErrorCode; exitCode: number };
};

export function okJson(command: string, data: Record<string, unknown> = {}): CliOk {
  return { ok: true, command, data };
}

function isCommanderCode(code: string): code is CommanderErrorCode {
  return code.startsWith("commander.");
}

/**
 * Error envelope. Domain errors carry their taxonomy code and exit code,
 * parser errors commander's; anything else is a bare message with exit code 1.
 */
export function errJson(command: string, err: FicpackError | CommanderError | string): CliErr {
  if (typeof err === "string") return { ok: false, command, error: { message: err, exitCode: 1 } };
  if (err instanceof FicpackError) {
    return { ok: false, command, error: { message: err.message, code: err.code, exitCode: err.exitCode } };
  }
  const code = isCommanderCode(err.code) ? err.code : undefined;
  return { ok: false, command, error: { message: err.message, code, exitCode: err.exitCode } };
}

export function printJson(payload: CliOk | CliErr): void {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}
