#!/usr/bin/env tsx
/**
 * CLI: format
 *
 * Usage: npm run format -- --input <file> [--output <file.docx>]
 *          [--template <name>] [--set <category.key=value>]... [--config <file.json>] [--timeout <ms>]
 *
 * .docx inputs are restyled; .md/.txt inputs are read as text and the
 * structure (title, headings, body, signature) is inferred.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import path from "path";
import { loadAppConfig } from "../shared/app_config.js";
import { TemplateCatalog } from "../style/catalog.js";
import { isStyleError } from "../style/errors.js";
import { DocxFormatter } from "../render/docx_formatter.js";
import { formatDocument } from "../service/format_service.js";
import { buildStore, defaultOutputPath, parseCliArgs } from "./args.js";

const USAGE =
  "Usage: npm run format -- --input <file> [--output <file.docx>] [--template <name>] " +
  "[--set <category.key=value>]... [--config <file.json>] [--timeout <ms>]";

async function main() {
  const appConfig = loadAppConfig();
  const args = parseCliArgs(process.argv.slice(2));

  if (!args.input) {
    console.error(USAGE);
    process.exit(1);
  }

  const inputPath = path.resolve(args.input);
  const outputPath = path.resolve(args.output ?? defaultOutputPath(args.input, appConfig.outDir));
  const startTime = Date.now();

  function log(step: string, msg: string) {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  [${elapsed}s] [${step}] ${msg}`);
  }

  let source: unknown;
  if (args.configPath) {
    log("CONFIG", `Loading configuration from ${args.configPath}`);
    source = JSON.parse(readFileSync(args.configPath, "utf-8"));
  } else {
    const store = buildStore(new TemplateCatalog(), args, appConfig.defaultTemplate);
    log("CONFIG", `Template: ${store.activeTemplate}`);
    for (const set of args.sets) {
      log("CONFIG", `  ${set.category}.${set.key} = ${set.raw}`);
    }
    source = store.snapshot();
  }

  log("FORMAT", `Input:  ${inputPath}`);
  log("FORMAT", `Output: ${outputPath}`);

  const result = await formatDocument(source, new DocxFormatter(), {
    inputPath,
    outputPath,
    timeoutMs: args.timeoutMs ?? appConfig.renderTimeoutMs,
  });

  log("FORMAT", `Rendered ${result.inputKind} input in ${result.elapsedMs}ms`);
  log("FORMAT", `Config hash: ${result.configHash.slice(0, 16)}`);
  console.log();
  console.log(`  ✓ Formatted document written to ${result.outputPath}`);
}

main().catch((err: unknown) => {
  if (isStyleError(err)) {
    console.error(`\n  ✗ ${err.code}: ${err.message}`);
  } else {
    console.error(`\n  ✗ Formatting failed: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof Error && err.stack) console.error(err.stack);
  }
  process.exit(1);
});
