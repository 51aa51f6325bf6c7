#!/usr/bin/env tsx
/**
 * API server entry point.
 *
 * Usage: npm run serve   (PORT and DOCSTYLE_* from the environment or .env)
 */

import "dotenv/config";
import { loadAppConfig } from "../shared/app_config.js";
import { createApp } from "./app.js";

const config = loadAppConfig();
const app = createApp({ config });

app.listen(config.port, () => {
  console.log(`docstyle API listening on :${config.port}`);
  console.log(`  default template: ${config.defaultTemplate}`);
  console.log(`  render timeout:   ${config.renderTimeoutMs}ms`);
});
