#!/usr/bin/env tsx
/**
 * Summary server entry point.
 *
 * Usage: npm start
 *
 * Loads the datasets from DATASET_DIR, deploys the summary endpoint and
 * listens on PORT.
 */

import "dotenv/config";
import { loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { createService, SERVICE_NAME } from "./bootstrap.js";

function main() {
  console.log(`  ${SERVICE_NAME} — analytics endpoint server`);
  console.log();

  try {
    const config = loadConfig();
    console.log(`  Datasets:  ${config.datasetDir}`);
    console.log();

    const service = createService(config);
    service.app.listen(config.port, () => {
      console.log();
      console.log(`  ✓ Listening on port ${config.port}`);
    });
  } catch (err) {
    console.error(`\n  ✗ Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main();
