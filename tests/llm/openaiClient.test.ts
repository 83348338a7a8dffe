import { beforeEach, describe, expect, it, vi } from "vitest";

const mockModelsList = vi.fn();
const mockChatCreate = vi.fn();

vi.mock("openai", () => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      _error: unknown,
      message: string | undefined,
      _headers: unknown
    ) {
      super(message);
    }
  }

  class MockOpenAI {
    static readonly APIError = APIError;
    readonly models = { list: mockModelsList };
    readonly chat = {
      completions: {
        create: mockChatCreate
      }
    };

    constructor(_: unknown) {}
  }

  return { default: MockOpenAI };
});

import OpenAI from "openai";
import { EmptyOutputError } from "../../src/errors";
import { OpenAiClient } from "../../src/llm/openaiClient";

const answer = (content: string | null) => ({ choices: [{ message: { content } }] });

describe("OpenAiClient", () => {
  beforeEach(() => {
    mockModelsList.mockReset();
    mockChatCreate.mockReset();
    mockModelsList.mockResolvedValue({ data: [{ id: "test-model" }] });
  });

  it("requests JSON mode and forwards the abort signal", async () => {
    mockChatCreate.mockResolvedValue(answer(' {"action":"proceed"} '));
    const controller = new AbortController();

    const client = new OpenAiClient("test-model");
    await expect(client.completeJsonObject("system text", "user text", controller.signal)).resolves.toBe('{"action":"proceed"}');

    expect(mockChatCreate).toHaveBeenCalledTimes(1);
    expect(mockChatCreate.mock.calls[0][0]).toMatchObject({ model: "test-model", response_format: { type: "json_object" } });
    expect(mockChatCreate.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it("throws EmptyOutputError when the answer has no content", async () => {
    mockChatCreate.mockResolvedValue(answer("   "));

    const client = new OpenAiClient("test-model");
    await expect(client.completeJsonObject("system text", "user text")).rejects.toBeInstanceOf(EmptyOutputError);
    expect(mockChatCreate).toHaveBeenCalledTimes(1);
  });

  it("retries without JSON mode when the provider rejects response_format", async () => {
    mockChatCreate
      .mockRejectedValueOnce(new OpenAI.APIError(400, undefined, "response_format is not supported", undefined))
      .mockResolvedValueOnce(answer('{"action":"ask_more"}'));
    const controller = new AbortController();

    const client = new OpenAiClient("test-model");
    await expect(client.completeJsonObject("system text", "user text", controller.signal)).resolves.toBe('{"action":"ask_more"}');

    expect(mockChatCreate).toHaveBeenCalledTimes(2);
    expect(mockChatCreate.mock.calls[1][0]).not.toHaveProperty("response_format");
    expect(mockChatCreate.mock.calls[1][1]).toEqual({ signal: controller.signal });
  });
});
