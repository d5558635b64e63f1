/**
 * Completion provider over the OpenAI Responses API.
 */

import OpenAI, { APIError } from "openai";

import type { ReasoningEffort, Verbosity } from "../config/pipeline/index.js";
import type { Completion, CompletionOptions, CompletionProvider } from "./completion.js";
import { ProviderError, errorMessage } from "./errors.js";

/** The request fields this provider sends. */
export interface ResponseRequest {
  model: string;
  input: string;
  max_output_tokens: number;
  reasoning?: { effort: ReasoningEffort };
  text?: { verbosity: Verbosity };
}

/** The response fields this provider reads. */
export interface ResponseLike {
  output_text?: unknown;
  status?: string;
  incomplete_details?: { reason?: string } | null;
  usage?: { input_tokens: number; output_tokens: number } | null;
}

export type CreateResponseFn = (
  body: ResponseRequest,
  options: { signal?: AbortSignal }
) => Promise<ResponseLike>;

const PROVIDER = "openai";

export class OpenAICompletionProvider implements CompletionProvider {
  readonly name = PROVIDER;

  constructor(private readonly createResponse: CreateResponseFn) {}

  /**
   * Build a provider backed by a real OpenAI client.
   */
  static fromClient(client: OpenAI): OpenAICompletionProvider {
    return new OpenAICompletionProvider((body, options) =>
      client.responses.create(body, options)
    );
  }

  /**
   * Build a provider from an API key. Retries are disabled: the revision
   * loop is the only retry mechanism in the pipeline.
   */
  static fromApiKey(apiKey: string): OpenAICompletionProvider {
    return OpenAICompletionProvider.fromClient(new OpenAI({ apiKey, maxRetries: 0 }));
  }

  async complete(
    prompt: string,
    model: string,
    options: CompletionOptions
  ): Promise<Completion> {
    const body: ResponseRequest = {
      model,
      input: prompt,
      max_output_tokens: options.maxOutputTokens,
      ...(options.reasoningEffort ? { reasoning: { effort: options.reasoningEffort } } : {}),
      ...(options.verbosity ? { text: { verbosity: options.verbosity } } : {}),
    };

    let response: ResponseLike;
    try {
      response = await this.createResponse(body, { signal: options.signal });
    } catch (err) {
      throw new ProviderError(`${PROVIDER} ${model}: ${errorMessage(err)}`, {
        provider: PROVIDER,
        status: err instanceof APIError ? err.status : undefined,
        cause: err,
      });
    }

    if (typeof response.output_text !== "string") {
      throw new ProviderError(`${PROVIDER} ${model}: response has no output_text`, {
        provider: PROVIDER,
      });
    }

    const text = response.output_text.trim();
    if (text === "") {
      const reason = response.incomplete_details?.reason;
      throw new ProviderError(
        `${PROVIDER} ${model}: empty response` + (reason ? ` (incomplete: ${reason})` : ""),
        { provider: PROVIDER }
      );
    }

    return {
      text,
      usage: {
        inputTokens: response.usage?.input_tokens ?? 0,
        outputTokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}
