#!/usr/bin/env tsx
/**
 * CLI: summary
 *
 * Usage: npm run summary -- --facility "<name>" [--dry-run]
 *
 * Produces the dashboard summary for one facility. With --dry-run the
 * resolution note, compact payload and prompt are printed and no API call
 * is made.
 */

import "dotenv/config";
import path from "path";
import { loadDatasets } from "../datasets/loader.js";
import { FacilityIndex, FacilityResolver } from "../facility/resolver.js";
import { buildCategorySpecs } from "../metrics/categories.js";
import { loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import {
  createDashboardSummary,
  isPrepared,
  prepareSummaryRequest,
} from "../summary/dashboard_summary.js";
import { readArgs } from "./args.js";

async function main() {
  const { values, switches } = readArgs(process.argv.slice(2));
  const facility = values.get("facility") ?? "";

  if (!facility) {
    console.error('Usage: npm run summary -- --facility "<name>" [--dry-run]');
    process.exit(1);
  }

  try {
    const config = loadConfig();
    const datasets = loadDatasets(path.resolve(config.datasetDir));
    const resolver = new FacilityResolver(FacilityIndex.fromBundle(datasets), config.resolver);
    const specs = buildCategorySpecs({ readmissionTopN: config.readmissionTopN });

    if (switches.has("dry-run")) {
      const request = prepareSummaryRequest({ datasets, resolver, specs }, facility);
      if (!isPrepared(request)) {
        console.log(request.resolution.note);
        return;
      }
      if (request.resolution.note) console.log(request.resolution.note);
      console.log(`  Facility:  ${request.payload.facility}`);
      console.log(`  Payload:   ${request.compactJson.length} chars`);
      console.log();
      console.log(request.prompt);
      return;
    }

    const summary = createDashboardSummary({ datasets, resolver, specs, generation: config.generation });
    console.log(await summary(facility));
  } catch (err) {
    console.error(`\n  ✗ Summary failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
