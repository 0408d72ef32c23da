/**
 * Parse saved catalog dumps into structured JSON documents.
 *
 * Usage: npx tsx scripts/parse-catalog.ts <file...> [--source melon] [--category concerts] [--out dir]
 *
 * Writes `<name>_parsed.json` per input and, for more than one input,
 * `catalog_summary.json` with cross-category totals. Melon files named like
 * `melon_<category>_raw.json` get that category; `--category` covers the rest.
 */

import { config } from "dotenv";
config();
import { readFileSync } from "node:fs";
import { basename, dirname, extname } from "node:path";
import { getDateSentinels, getSampleDatesLimit, getTopVenuesLimit } from "../lib/config";
import { getSourceById, getSources } from "../lib/catalog/registry";
import { fileMetadata } from "../lib/catalog/metadata";
import { getMelonCategory, registerAllSources } from "../lib/catalog/sources";
import type { CatalogSource } from "../lib/catalog/schema";
import { BatchError, errorMessage } from "../lib/pipeline/errors";
import { processCatalog } from "../lib/pipeline/processCatalog";
import { writeJsonOutput } from "../lib/pipeline/writeOutput";
import { summarizeCategories, type CatalogSummary, type CategoryReport } from "../lib/stats/summarizeCategories";

interface CliArgs {
  files: string[];
  sourceId: string;
  category?: string;
  outDir?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { files: [], sourceId: "melon" };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = () => {
      const value = argv[++i];
      if (value == null) throw new Error(`Missing value for ${arg}`);
      return value;
    };
    if (arg === "--source") args.sourceId = next();
    else if (arg === "--category") args.category = next();
    else if (arg === "--out") args.outDir = next();
    else args.files.push(arg);
  }
  return args;
}

function withEnvOverrides(source: CatalogSource): CatalogSource {
  const sentinels = getDateSentinels();
  if (!sentinels) return source;
  return { ...source, dimensions: { ...source.dimensions, dateSentinels: sentinels } };
}

function printSummary(summary: CatalogSummary): void {
  console.log("");
  console.log(`Total events: ${summary.total_events_across_categories}`);
  console.log(`Unique venues: ${summary.total_unique_venues}`);
  console.log(`Regions: ${summary.total_regions}`);
  if (summary.price_range) {
    console.log(`Price range: ${summary.price_range.lowest_price} - ${summary.price_range.highest_price}`);
  }
  for (const [key, breakdown] of Object.entries(summary.category_breakdown)) {
    console.log(`  ${breakdown.name} (${key}): ${breakdown.total_events} events, ${breakdown.unique_venues} venues`);
    if (breakdown.top_venues.length > 0) console.log(`    top venues: ${breakdown.top_venues.join(", ")}`);
  }
}

function main() {
  registerAllSources();
  const args = parseArgs(process.argv.slice(2));

  if (args.files.length === 0) {
    console.error("Usage: parse-catalog <file...> [--source id] [--category key] [--out dir]");
    console.error(`Sources: ${getSources().map((s) => s.id).join(", ")}`);
    process.exitCode = 1;
    return;
  }

  const registered = getSourceById(args.sourceId);
  if (!registered) {
    console.error(`[parse-catalog] unknown source "${args.sourceId}"`);
    process.exitCode = 1;
    return;
  }
  const source = withEnvOverrides(registered);
  if (args.category && !getMelonCategory(args.category)) {
    console.warn(`[parse-catalog] unknown category "${args.category}", ignoring`);
  }
  const options = { topVenues: getTopVenuesLimit(), sampleDates: getSampleDatesLimit() };

  const reports: CategoryReport[] = [];
  for (const file of args.files) {
    console.log(`Parsing ${file} …`);
    try {
      const doc = processCatalog(readFileSync(file), source, fileMetadata(file, source, args.category), options);
      const stem = basename(file, extname(file));
      const outFile = writeJsonOutput(args.outDir ?? dirname(file), `${stem}_parsed.json`, doc);
      console.log(`  -> ${doc.total_events} events written to ${outFile}`);
      const name = typeof doc.category_name === "string" ? doc.category_name : undefined;
      reports.push({ key: stem, name, report: doc });
    } catch (e) {
      const code = e instanceof BatchError ? ` (${e.code})` : "";
      console.error(`[parse-catalog] ${file}: ${errorMessage(e)}${code}`);
      process.exitCode = 1;
    }
  }

  if (reports.length > 1) {
    const summary = summarizeCategories(reports);
    const outFile = writeJsonOutput(args.outDir ?? dirname(args.files[0]), "catalog_summary.json", summary);
    printSummary(summary);
    console.log(`Summary written to ${outFile}`);
  }
}

main();

