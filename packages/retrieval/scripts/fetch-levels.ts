/**
 * Fetch groundwater levels (or site locations) and print a summary.
 *
 * Usage: npx tsx scripts/fetch-levels.ts [--sites] [--raw-dates] [--tz <zone>] <featureId>...
 *
 * Example: npx tsx scripts/fetch-levels.ts USGS.272838082142201 USGS:404159100494601
 */

import type { Row } from "@gwsos/types";
import { fetchLevels, fetchSites } from "../src/index.js";

const args = process.argv.slice(2);
const tzIndex = args.indexOf("--tz");
const timezone = tzIndex !== -1 ? args[tzIndex + 1] ?? "" : "";
const flags = args.filter((a) => a.startsWith("--"));
const positional = args.filter((a, i) => !a.startsWith("--") && (tzIndex === -1 || i !== tzIndex + 1));

if (positional.length === 0) {
  console.error("Usage: npx tsx scripts/fetch-levels.ts [--sites] [--raw-dates] [--tz <zone>] <featureId>...");
  process.exit(1);
}

function fmt(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (value === null || value === undefined) return "NA";
  return String(value);
}

async function main() {
  const startTime = Date.now();

  if (flags.includes("--sites")) {
    const sites = await fetchSites(positional);
    console.log("");
    console.log(`=== Sites (${sites.rows.length}) ===`);
    for (const row of sites.rows) {
      console.log(`  ${row.site}  ${fmt(row.decLat)}, ${fmt(row.decLon)}  ${fmt(row.description)}`);
    }
    return;
  }

  const result = await fetchLevels(positional, {
    parseDateTime: !flags.includes("--raw-dates"),
    timezone,
  });
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

  console.log("");
  console.log("=== Retrieval Complete ===");
  console.log(`Time: ${elapsed}s`);
  console.log(`Observations: ${result.rows.length.toLocaleString()}`);
  console.log(`Columns: ${result.columns.join(", ")}`);
  console.log("");
  console.log("=== Metadata ===");
  for (const row of result.metadata.rows) {
    console.log(`  ${fmt(row.identifier)}  generated ${fmt(row.generationDate)}`);
  }
  console.log("");
  console.log("=== Sample Rows ===");
  for (const row of result.rows.slice(0, 5)) {
    const cells: Row = row;
    console.log("  " + result.columns.map((column) => fmt(cells[column])).join("  "));
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
