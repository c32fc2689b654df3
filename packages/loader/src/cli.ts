#!/usr/bin/env node
/**
 * spritekin-inspect: load an entity document and print what its templates
 * resolve to.
 *
 * Usage:
 *   spritekin-inspect <document.json> [--template name] [--state s] [--ticks n] [--dt ms] [--json]
 *
 * Document resolution: positional arg > SPRITEKIN_DOCUMENT env.
 */

import { pathToFileURL } from "node:url";
import { EntityError, createConsoleLogger } from "@spritekin/core";
import { parseInspectConfig } from "./config.js";
import type { InspectConfig } from "./config.js";
import { loadEntityDocument } from "./document.js";
import { createEngine } from "./engine.js";
import { formatTemplateList, formatTemplateReport, inspectTemplate, listTemplates } from "./inspect.js";
import { lintEngine } from "./lint.js";

const USAGE =
  "Usage: spritekin-inspect <document.json> [--template name] [--state s] [--ticks n] [--dt ms] [--json]";

// Warnings and errors go to stderr; stdout carries only the report.
const logger = createConsoleLogger("spritekin:inspect", "warn");

/** Run one inspection and return the text to print. */
export async function runInspect(config: InspectConfig): Promise<string> {
  if (config.document === undefined) {
    throw new EntityError("INVALID_CONFIG", "No entity document given (argument or SPRITEKIN_DOCUMENT)");
  }

  const document = await loadEntityDocument(config.document);
  const engine = createEngine(document, { logger });

  for (const warning of lintEngine(engine).warnings) {
    logger.warn(warning);
  }

  if (config.template === undefined) {
    const templates = listTemplates(engine);
    return config.json ? JSON.stringify(templates, null, 2) : formatTemplateList(templates);
  }

  const report = inspectTemplate(engine, config.template, {
    ...(config.state !== undefined && { state: config.state }),
    ...(config.dt !== undefined && { dt: config.dt }),
    ticks: config.ticks,
  });
  return config.json ? JSON.stringify(report, null, 2) : formatTemplateReport(report);
}

/** Entry point for the spritekin-inspect CLI. */
export async function inspectMain(argv: readonly string[]): Promise<void> {
  let config: InspectConfig;
  try {
    config = parseInspectConfig(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.stderr.write(`${USAGE}\n`);
    process.exitCode = 2;
    return;
  }

  if (config.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  try {
    process.stdout.write(`${await runInspect(config)}\n`);
  } catch (err) {
    if (!EntityError.isEntityError(err)) throw err;
    logger.error(err.message);
    const issues = err.details?.["issues"];
    if (Array.isArray(issues)) {
      for (const issue of issues) logger.error(`  ${String(issue)}`);
    }
    process.exitCode = 1;
  }
}

// Run if executed directly
const entry = process.argv[1];
const isDirectExecution = entry !== undefined && import.meta.url === pathToFileURL(entry).href;
if (isDirectExecution) {
  inspectMain(process.argv).catch((err: unknown) => {
    logger.error("Unexpected failure", err);
    process.exitCode = 1;
  });
}
