#!/usr/bin/env tsx
/**
 * CLI: templates
 *
 * Usage: npm run templates
 *
 * Lists the builtin templates and their key settings.
 */

import { TemplateCatalog } from "../style/catalog.js";

function main() {
  const catalog = new TemplateCatalog();
  const templates = catalog.list();

  console.log(`  Builtin templates: ${templates.length}`);
  console.log();

  for (const t of templates) {
    const cfg = catalog.resolve(t.name);
    const doc = cfg.document;
    console.log(`  ${t.name}`);
    console.log(`    Label:    ${t.label}`);
    console.log(`    About:    ${t.description}`);
    console.log(
      `    Margins:  ${doc.margin_top} / ${doc.margin_bottom} / ${doc.margin_left} / ${doc.margin_right} cm`,
    );
    console.log(`    Spacing:  ${doc.line_spacing}`);
    console.log(`    Body:     ${cfg.body.font_family} ${cfg.body.font_size}pt ${cfg.body.alignment}`);
    console.log();
  }
  console.log(`  Any edit to a loaded template marks it "custom".`);
}

main();
