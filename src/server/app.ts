/**
 * Analytics Endpoint API
 *
 * Express app exposing deployed endpoints to the dashboard integration:
 *   GET  /info            service info + dataset hashes
 *   GET  /endpoints       deployed endpoint names and descriptions
 *   POST /query/:name     invoke an endpoint with { data: { _arg1, _arg2, ... } }
 */

import express from "express";
import type { Express } from "express";
import { z } from "zod";

import { errorMessage } from "../shared/errors.js";
import type { EndpointRegistry } from "./endpoint_registry.js";

export const QueryRequestSchema = z.object({
  data: z
    .record(z.union([z.string(), z.array(z.string())]))
    .refine((d) => Object.keys(d).every((k) => /^_arg\d+$/.test(k)), {
      message: "Argument names must be _arg1, _arg2, ...",
    })
    .default({}),
});

export interface ServiceInfo {
  name: string;
  facilityCount: number;
  datasetHashes: Record<string, string>;
}

/** Positional arguments ordered by their numeric suffix. */
export function orderedArgs(data: Record<string, unknown>): unknown[] {
  return Object.keys(data)
    .sort((a, b) => Number(a.slice(4)) - Number(b.slice(4)))
    .map((k) => data[k]);
}

export function createApp(registry: EndpointRegistry, info: ServiceInfo): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  // ── GET /info ──────────────────────────────────────────────────────
  app.get("/info", (_req, res) => {
    res.json({ ...info, endpoints: Object.keys(registry.list()) });
  });

  // ── GET /endpoints ─────────────────────────────────────────────────
  app.get("/endpoints", (_req, res) => {
    res.json(registry.list());
  });

  // ── POST /query/:name ──────────────────────────────────────────────
  app.post("/query/:name", async (req, res) => {
    const { name } = req.params;
    if (!registry.has(name)) {
      res.status(404).json({ error: `Unknown endpoint: ${name}` });
      return;
    }

    const parsed = QueryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
      return;
    }

    const t0 = Date.now();
    try {
      const response = await registry.query(name, orderedArgs(parsed.data.data));
      console.log(`  ✓ ${name} answered in ${Date.now() - t0}ms`);
      res.json({ model: name, response });
    } catch (err) {
      console.error(`  ✗ ${name} failed: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return app;
}
