/**
 * Service bootstrap: load datasets once, build the facility resolver, and
 * deploy the summary endpoint. Everything built here is read-only afterwards.
 */

import path from "path";
import type { Express } from "express";

import { loadDatasets } from "../datasets/loader.js";
import { DATASET_IDS } from "../datasets/types.js";
import type { DatasetBundle } from "../datasets/types.js";
import { FacilityIndex, FacilityResolver } from "../facility/resolver.js";
import type { NarrativeClientFactory } from "../generation/llm_client.js";
import { buildCategorySpecs } from "../metrics/categories.js";
import type { ServiceConfig } from "../shared/config.js";
import { shortHash } from "../shared/hash.js";
import { createDashboardSummary } from "../summary/dashboard_summary.js";
import type { DashboardSummary } from "../summary/dashboard_summary.js";
import { createApp } from "./app.js";
import { EndpointRegistry } from "./endpoint_registry.js";

export const SERVICE_NAME = "facility-quality-brief";

export interface Service {
  config: ServiceConfig;
  datasets: DatasetBundle;
  resolver: FacilityResolver;
  summary: DashboardSummary;
  registry: EndpointRegistry;
  app: Express;
}

export interface ServiceOptions {
  /** Pre-loaded datasets; read from `config.datasetDir` when omitted. */
  datasets?: DatasetBundle;
  clientFactory?: NarrativeClientFactory;
  quiet?: boolean;
}

export function createService(config: ServiceConfig, options: ServiceOptions = {}): Service {
  const log: (line: string) => void = options.quiet ? () => undefined : (line) => console.log(line);

  const datasets = options.datasets ?? loadDatasets(path.resolve(config.datasetDir));
  for (const id of DATASET_IDS) {
    const table = datasets.tables[id];
    const hash = datasets.fileHashes[id];
    log(
      `  ${table.label}: ${table.rows.length} rows, ${table.columns.length} columns` +
        (hash ? ` [${shortHash(hash)}...]` : ""),
    );
  }

  const index = FacilityIndex.fromBundle(datasets);
  const resolver = new FacilityResolver(index, config.resolver);
  log(`  Facilities indexed: ${index.size}`);

  const summary = createDashboardSummary({
    datasets,
    resolver,
    generation: config.generation,
    specs: buildCategorySpecs({ readmissionTopN: config.readmissionTopN }),
    clientFactory: options.clientFactory,
    onGenerated: (facility, meta) =>
      log(
        `  ${facility}: ${meta.model} ${meta.inputTokens}→${meta.outputTokens} tokens, ` +
          `${meta.latencyMs}ms, ~$${meta.costEstimate.toFixed(4)} (${meta.correlationId})`,
      ),
  });

  if (!config.generation.apiKey) {
    log("  ⚠ ANTHROPIC_API_KEY is not set; summaries will return a configuration error.");
  }

  const registry = new EndpointRegistry();
  registry.deploy(config.endpointName, summary, {
    description: "Generated hospital performance summary for a given facility name.",
    override: true,
  });
  log(`  Deployed endpoint: ${config.endpointName}`);

  const datasetHashes: Record<string, string> = {};
  for (const id of DATASET_IDS) {
    const hash = datasets.fileHashes[id];
    if (hash) datasetHashes[id] = hash;
  }

  const app = createApp(registry, {
    name: SERVICE_NAME,
    facilityCount: index.size,
    datasetHashes,
  });

  return { config, datasets, resolver, summary, registry, app };
}
