import { describe, expect, it, vi } from "vitest";

import {
  AuthenticationError,
  RateLimitError,
  RemoteServiceError,
} from "../../shared/errors/app-errors";
import type { GenerationRequest } from "../../shared/types";
import { createOpenAiCompleter, extractCompletionText, readErrorDetail } from "./chat-completions";
import type { FetchLike } from "./chat-completions";

const request: GenerationRequest = {
  model: "gpt-4o",
  messages: [
    { role: "system", content: "You write cover letters." },
    { role: "user", content: "Resume and job" },
  ],
  temperature: 0.7,
  maxTokens: 1000,
};

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function completerWith(fetchImpl: FetchLike) {
  return createOpenAiCompleter({
    apiKey: "test-secret",
    apiBaseUrl: "https://api.example.test/v1/",
    fetchImpl,
  });
}

describe("createOpenAiCompleter", () => {
  it("posts one chat completion request and returns the message content", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(
      jsonResponse(200, { choices: [{ message: { role: "assistant", content: "Dear Hiring Manager,..." } }] }),
    );

    const text = await completerWith(fetchImpl)(request);

    expect(text).toBe("Dear Hiring Manager,...");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.example.test/v1/chat/completions");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: "gpt-4o",
      messages: request.messages,
      temperature: 0.7,
      max_tokens: 1000,
    });
  });

  it.each([401, 403])("maps %i to AuthenticationError", async (status) => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValue(jsonResponse(status, { error: { message: "Incorrect API key provided." } }));

    const error = await completerWith(fetchImpl)(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({
      message: `OpenAI rejected the API key (${status}): Incorrect API key provided.`,
    });
  });

  it("maps 429 to RateLimitError with the retry hint", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValue(
        jsonResponse(429, { error: { message: "Rate limit reached for gpt-4o." } }, { "retry-after": "20" }),
      );

    const error = await completerWith(fetchImpl)(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({
      message: "OpenAI rate limit reached (429, retry after 20s): Rate limit reached for gpt-4o.",
      retryAfter: "20",
    });
  });

  it("maps other error statuses to RemoteServiceError", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(new Response("upstream timeout", { status: 502 }));

    const error = await completerWith(fetchImpl)(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error).toMatchObject({ status: 502, message: "OpenAI request failed (502): upstream timeout" });
  });

  it("reports network failures as RemoteServiceError", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValue(new TypeError("fetch failed"));

    await expect(completerWith(fetchImpl)(request)).rejects.toThrow("Could not reach OpenAI: fetch failed");
  });

  it("rejects a body that is not JSON", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(new Response("<html>", { status: 200 }));

    await expect(completerWith(fetchImpl)(request)).rejects.toThrow(
      "OpenAI returned a response that is not valid JSON.",
    );
  });

  it("rejects a body without message content", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, { choices: [] }));

    await expect(completerWith(fetchImpl)(request)).rejects.toBeInstanceOf(RemoteServiceError);
  });
});

describe("extractCompletionText", () => {
  it("reads the first choice", () => {
    expect(extractCompletionText({ choices: [{ message: { content: "one" } }, { message: { content: "two" } }] })).toBe(
      "one",
    );
  });

  it("rejects null content", () => {
    expect(() => extractCompletionText({ choices: [{ message: { content: null } }] })).toThrow(RemoteServiceError);
    expect(() => extractCompletionText("text")).toThrow(RemoteServiceError);
  });
});

describe("readErrorDetail", () => {
  it("prefers the OpenAI error message", () => {
    expect(readErrorDetail('{"error":{"message":"Bad model","type":"invalid_request_error"}}')).toBe("Bad model");
  });

  it("falls back to the trimmed body", () => {
    expect(readErrorDetail("  Service Unavailable \n")).toBe("Service Unavailable");
    expect(readErrorDetail('{"detail":"nope"}')).toBe('{"detail":"nope"}');
  });
});
