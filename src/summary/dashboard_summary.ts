/**
 * Dashboard Summary — the operation the dashboard invokes by name.
 *
 * resolve facility → build compact payload → build prompt → generate.
 * Every user-facing outcome is a display string. Dataset schema errors are
 * the one exception and propagate to the caller.
 */

import type { DatasetBundle } from "../datasets/types.js";
import type { FacilityResolver, Resolution } from "../facility/resolver.js";
import type { GenerationSettings } from "../shared/config.js";
import { errorMessage, errorTypeName } from "../shared/errors.js";
import { createAnthropicClient } from "../generation/llm_client.js";
import type { LLMCallMetadata, NarrativeClientFactory } from "../generation/llm_client.js";
import type { CategorySpecs } from "../metrics/types.js";
import { buildCompactPayload, serializeCompact } from "./payload.js";
import type { CompactPayload } from "./payload.js";
import { buildSummaryPrompt } from "./prompt.js";

export const MISSING_KEY_MESSAGE =
  "[Configuration error] ANTHROPIC_API_KEY is not set on the summary server.\n" +
  "Set it and restart the server.";

export const EMPTY_RESPONSE_MESSAGE = "[The model returned an empty response.]";

export interface SummaryDeps {
  datasets: DatasetBundle;
  resolver: FacilityResolver;
  generation: GenerationSettings;
  specs?: CategorySpecs;
  clientFactory?: NarrativeClientFactory;
  /** Receives metadata of every successful generation call. */
  onGenerated?: (facility: string, metadata: LLMCallMetadata) => void;
}

export interface SummaryRequest {
  resolution: Resolution;
  payload: CompactPayload;
  compactJson: string;
  prompt: string;
}

export type DashboardSummary = (facilityArg: unknown) => Promise<string>;

/**
 * Coerce the dashboard argument to a facility name. Dashboards pass either a
 * string or a column of values, in which case the first one is used.
 */
export function coerceFacilityArg(arg: unknown): string {
  const value = Array.isArray(arg) ? arg[0] : arg;
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

/**
 * Resolve and assemble everything needed for the generation call.
 * Returns the resolution alone when the facility could not be resolved.
 */
export function prepareSummaryRequest(
  deps: Pick<SummaryDeps, "datasets" | "resolver" | "specs">,
  facilityArg: unknown,
): SummaryRequest | { resolution: Resolution } {
  const resolution = deps.resolver.resolve(coerceFacilityArg(facilityArg));
  if (!resolution.canonical) return { resolution };

  const payload = buildCompactPayload(deps.datasets, resolution.canonical, deps.specs);
  const compactJson = serializeCompact(payload);
  return {
    resolution,
    payload,
    compactJson,
    prompt: buildSummaryPrompt(resolution.canonical, compactJson),
  };
}

export function isPrepared(
  request: SummaryRequest | { resolution: Resolution },
): request is SummaryRequest {
  return "prompt" in request;
}

export function createDashboardSummary(deps: SummaryDeps): DashboardSummary {
  const clientFactory = deps.clientFactory ?? createAnthropicClient;

  return async (facilityArg: unknown): Promise<string> => {
    const request = prepareSummaryRequest(deps, facilityArg);
    if (!isPrepared(request)) return request.resolution.note;

    const { resolution, prompt } = request;
    const { apiKey, model, maxTokens, temperature } = deps.generation;
    if (!apiKey) return MISSING_KEY_MESSAGE;

    try {
      const client = clientFactory(apiKey);
      const result = await client.generate({ prompt, model, maxTokens, temperature });
      deps.onGenerated?.(resolution.canonical, result.metadata);

      const text = result.text.trim() || EMPTY_RESPONSE_MESSAGE;
      return resolution.note ? `${resolution.note}\n\n${text}` : text;
    } catch (err) {
      return `[Narrative error] ${errorTypeName(err)}: ${errorMessage(err)}`;
    }
  };
}
