#!/usr/bin/env tsx
/**
 * CLI: preview
 *
 * Usage: npm run preview -- [--template <name>] [--set <category.key=value>]...
 *
 * Prints the configuration that `format` would use, as JSON, after the
 * template and edits are applied.
 */

import "dotenv/config";
import { loadAppConfig } from "../shared/app_config.js";
import { configFingerprint } from "../shared/hash.js";
import { TemplateCatalog } from "../style/catalog.js";
import { isStyleError } from "../style/errors.js";
import { buildStore, parseCliArgs } from "./args.js";

function main() {
  const appConfig = loadAppConfig();
  const args = parseCliArgs(process.argv.slice(2));
  const store = buildStore(new TemplateCatalog(), args, appConfig.defaultTemplate);
  const snapshot = store.snapshot();

  console.log(`// template: ${store.activeTemplate}  hash: ${configFingerprint(snapshot).slice(0, 16)}`);
  console.log(JSON.stringify(snapshot, null, 2));
}

try {
  main();
} catch (err) {
  if (isStyleError(err)) {
    console.error(`  ✗ ${err.code}: ${err.message}`);
  } else {
    console.error(`  ✗ ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
}
