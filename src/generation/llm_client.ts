/**
 * LLM Client Module
 *
 * Wraps the Anthropic SDK behind a small NarrativeClient interface and
 * returns structured metadata with every call. No retry and no timeout
 * override: a failing call fails the single request that made it.
 */

import Anthropic from "@anthropic-ai/sdk";
import { v4 as uuidv4 } from "uuid";

/** Structured metadata returned from every LLM call. */
export interface LLMCallMetadata {
  provider: string;
  model: string;
  correlationId: string;
  providerRequestId: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
  costEstimate: number;
}

/** Result of a single LLM call: generated text + metadata. */
export interface LLMCallResult {
  text: string;
  metadata: LLMCallMetadata;
}

export interface NarrativeRequest {
  prompt: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface NarrativeClient {
  generate(request: NarrativeRequest): Promise<LLMCallResult>;
}

export type NarrativeClientFactory = (apiKey: string) => NarrativeClient;

const INPUT_COST_PER_MTOK = 3;
const OUTPUT_COST_PER_MTOK = 15;

export function estimateCost(inputTokens: number, outputTokens: number): number {
  return (inputTokens * INPUT_COST_PER_MTOK + outputTokens * OUTPUT_COST_PER_MTOK) / 1_000_000;
}

export class AnthropicNarrativeClient implements NarrativeClient {
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  /**
   * Send the prompt as a single user message. Returns the first text block,
   * trimmed, or "" when the model produced none.
   */
  async generate(request: NarrativeRequest): Promise<LLMCallResult> {
    const correlationId = uuidv4();
    const t0 = Date.now();

    const response = await this.client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages: [{ role: "user", content: request.prompt }],
    });

    const latencyMs = Date.now() - t0;
    let text = "";
    for (const block of response.content) {
      if (block.type === "text") {
        text = block.text.trim();
        break;
      }
    }

    const inputTokens = response.usage.input_tokens;
    const outputTokens = response.usage.output_tokens;

    return {
      text,
      metadata: {
        provider: "anthropic",
        model: response.model,
        correlationId,
        providerRequestId: response.id,
        inputTokens,
        outputTokens,
        latencyMs,
        costEstimate: estimateCost(inputTokens, outputTokens),
      },
    };
  }
}

export const createAnthropicClient: NarrativeClientFactory = (apiKey) =>
  new AnthropicNarrativeClient(apiKey);
