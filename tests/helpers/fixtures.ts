import path from "path";
import { fileURLToPath } from "url";

import { loadDatasets } from "../../src/datasets/loader.js";
import type { DatasetBundle } from "../../src/datasets/types.js";
import type { LLMCallResult, NarrativeClientFactory, NarrativeRequest } from "../../src/generation/llm_client.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const FIXTURE_DIR = path.resolve(__dirname, "..", "fixtures", "datasets");

export function loadFixtureBundle(): DatasetBundle {
  return loadDatasets(FIXTURE_DIR);
}

/**
 * Narrative client stand-in: records every request and answers with
 * `reply`, or rejects with `reply` when it is an Error.
 */
export function fakeClientFactory(reply: string | Error = "Generated summary text") {
  const requests: NarrativeRequest[] = [];
  const apiKeys: string[] = [];

  const factory: NarrativeClientFactory = (apiKey) => {
    apiKeys.push(apiKey);
    return {
      async generate(request: NarrativeRequest): Promise<LLMCallResult> {
        requests.push(request);
        if (reply instanceof Error) throw reply;
        return {
          text: reply,
          metadata: {
            provider: "fake",
            model: request.model,
            correlationId: "corr-1",
            providerRequestId: "req-1",
            inputTokens: 100,
            outputTokens: 50,
            latencyMs: 1,
            costEstimate: 0,
          },
        };
      },
    };
  };

  return { factory, requests, apiKeys };
}
