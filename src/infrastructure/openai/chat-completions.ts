import {
  AuthenticationError,
  RateLimitError,
  RemoteServiceError,
} from "../../shared/errors/app-errors";
import type { GenerationRequest, TextCompleter } from "../../shared/types";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OpenAiCompleterOptions {
  apiKey: string;
  apiBaseUrl: string;
  fetchImpl?: FetchLike;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Pulls `error.message` out of an OpenAI error body, falling back to the raw text. */
export function readErrorDetail(body: string): string {
  const fallback = body.trim().slice(0, 300);
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return fallback;
  }
  if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === "string") {
    return parsed.error.message;
  }
  return fallback;
}

function withDetail(message: string, detail: string): string {
  return detail ? `${message}: ${detail}` : message;
}

function failureFor(response: Response, detail: string): Error {
  if (response.status === 401 || response.status === 403) {
    return new AuthenticationError(withDetail(`OpenAI rejected the API key (${response.status})`, detail));
  }
  if (response.status === 429) {
    const retryAfter = response.headers.get("retry-after") ?? undefined;
    const status = retryAfter ? `429, retry after ${retryAfter}s` : "429";
    return new RateLimitError(withDetail(`OpenAI rate limit reached (${status})`, detail), retryAfter);
  }
  return new RemoteServiceError(withDetail(`OpenAI request failed (${response.status})`, detail), response.status);
}

export function extractCompletionText(data: unknown): string {
  const content = isRecord(data) ? (data as ChatCompletionResponse).choices?.[0]?.message?.content : undefined;
  if (typeof content !== "string") {
    throw new RemoteServiceError("OpenAI response missing choices[0].message.content.");
  }
  return content;
}

export function createOpenAiCompleter(options: OpenAiCompleterOptions): TextCompleter {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const endpoint = `${options.apiBaseUrl.replace(/\/+$/, "")}/chat/completions`;

  return async (request: GenerationRequest) => {
    let response: Response;
    try {
      response = await fetchImpl(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        }),
      });
    } catch (err) {
      throw new RemoteServiceError(`Could not reach OpenAI: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!response.ok) {
      const detail = readErrorDetail(await response.text().catch(() => ""));
      throw failureFor(response, detail);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new RemoteServiceError("OpenAI returned a response that is not valid JSON.", response.status);
    }
    return extractCompletionText(data);
  };
}
