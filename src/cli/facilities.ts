#!/usr/bin/env tsx
/**
 * CLI: facilities
 *
 * Usage: npm run facilities -- [--query <text>]
 *
 * Lists every canonical facility name, or shows how <text> resolves.
 */

import "dotenv/config";
import path from "path";
import { loadDatasets } from "../datasets/loader.js";
import { FacilityIndex, FacilityResolver } from "../facility/resolver.js";
import { loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { readArgs } from "./args.js";

function main() {
  const { values } = readArgs(process.argv.slice(2));
  const query = values.get("query");

  try {
    const config = loadConfig();
    const index = FacilityIndex.fromBundle(loadDatasets(path.resolve(config.datasetDir)));

    if (query === undefined) {
      for (const name of [...index.names].sort()) console.log(name);
      console.log();
      console.log(`  ${index.size} facilities`);
      return;
    }

    const { canonical, note } = new FacilityResolver(index, config.resolver).resolve(query);
    console.log(`  Query:     ${query}`);
    console.log(`  Resolved:  ${canonical || "(none)"}`);
    if (note) console.log(`  Note:      ${note}`);
  } catch (err) {
    console.error(`\n  ✗ Lookup failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main();
