/**
 * CLI argument parsing for spritekin-inspect.
 *
 * Supports:
 *   spritekin-inspect entities.json
 *   spritekin-inspect entities.json --template town_guard
 *   spritekin-inspect entities.json --template town_guard --state moving_south --ticks 3 --dt 100
 *   SPRITEKIN_DOCUMENT=entities.json spritekin-inspect --json
 */

import { EntityError } from "@spritekin/core";

/** Parsed configuration for one spritekin-inspect run. */
export interface InspectConfig {
  /** Path of the entity document. */
  document?: string;
  /** Template to resolve; lists all templates when absent. */
  template?: string;
  /** Animation state to play instead of the one a spawned entity starts in. */
  state?: string;
  /** Playback ticks to run before printing the frame. */
  ticks: number;
  /** Milliseconds per tick; defaults to the engine's frame interval. */
  dt?: number;
  /** Print JSON instead of text. */
  json: boolean;
  help: boolean;
}

function parseCount(flag: string, raw: string | undefined, integer: boolean): number {
  const value = Number(raw);
  if (raw === undefined || raw === "" || !Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    const expected = integer ? "a non-negative integer" : "a non-negative number";
    throw new EntityError("INVALID_CONFIG", `${flag} expects ${expected}, got "${raw ?? ""}"`, { flag });
  }
  return value;
}

/**
 * Parses process.argv into an InspectConfig.
 *
 * @param argv - The full process.argv array
 * @param env - Defaults to `process.env`; supplies `SPRITEKIN_DOCUMENT`
 * @throws {EntityError} `INVALID_CONFIG` for a malformed `--ticks` or `--dt`
 */
export function parseInspectConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env,
): InspectConfig {
  const args = argv.slice(2); // skip node + script

  let document: string | undefined;
  let template: string | undefined;
  let state: string | undefined;
  let ticks = 0;
  let dt: number | undefined;
  let json = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) break;

    if (arg === "--template" && i + 1 < args.length) {
      template = args[++i];
    } else if (arg === "--state" && i + 1 < args.length) {
      state = args[++i];
    } else if (arg === "--ticks") {
      ticks = parseCount("--ticks", args[++i], true);
    } else if (arg === "--dt") {
      dt = parseCount("--dt", args[++i], false);
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (!arg.startsWith("--") && document === undefined) {
      document = arg;
    }
  }

  return {
    document: document ?? env["SPRITEKIN_DOCUMENT"],
    template,
    state,
    ticks,
    dt,
    json,
    help,
  };
}
