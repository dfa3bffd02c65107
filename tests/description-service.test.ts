import { InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { beforeEach, describe, expect, test, vi } from "vitest";
import DescriptionService from "../src/services/bedrock";
import { ModelFactory } from "../src/services/bedrock/models/model-factory";
import { EncodedPayload } from "../src/services/image/types";
import { AllServicesUnavailableError, TimeoutError } from "../src/utils/errors";
import { DEFAULT_DESCRIPTION_PROMPT, LLMConfig } from "../src/utils/narrator-config";

const { send, destroy } = vi.hoisted(() => ({ send: vi.fn(), destroy: vi.fn() }));

vi.mock("@aws-sdk/client-bedrock-runtime", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-bedrock-runtime")>();
  return {
    ...actual,
    BedrockRuntimeClient: class {
      send = send;
      destroy = destroy;
    },
  };
});

const MODELS = {
  A: "anthropic.claude-test-a",
  B: "anthropic.claude-test-b",
  C: "anthropic.claude-test-c",
  D: "anthropic.claude-test-d",
};

const payload: EncodedPayload = {
  data: Buffer.from("jpeg-bytes"),
  format: "jpeg",
  mediaType: "image/jpeg",
  width: 4,
  height: 3,
  quality: 85,
  sizeBytes: 10,
  attempts: [{ width: 4, height: 3, quality: 85, sizeBytes: 10 }],
};

function llmConfig(overrides: Partial<LLMConfig> = {}): LLMConfig {
  return {
    modelIds: [MODELS.A, MODELS.B, MODELS.C, MODELS.D],
    maxTokens: 1000,
    prompt: DEFAULT_DESCRIPTION_PROMPT,
    timeoutMs: 1000,
    ...overrides,
  };
}

function jsonBody(value: unknown) {
  return { body: new TextEncoder().encode(JSON.stringify(value)) };
}

function claudeReply(text: string) {
  return jsonBody({
    content: [{ type: "text", text }],
    stop_reason: "end_turn",
    usage: { input_tokens: 1200, output_tokens: 40 },
  });
}

function requestedModels(): unknown[] {
  return send.mock.calls.map(([command]) => (command instanceof InvokeModelCommand ? command.input.modelId : undefined));
}

function requestBody(callIndex: number): unknown {
  const [command] = send.mock.calls[callIndex];
  if (!(command instanceof InvokeModelCommand)) {
    throw new Error("expected an InvokeModelCommand");
  }
  return JSON.parse(String(command.input.body));
}

function abortSignalOf([, options]: unknown[]): AbortSignal | undefined {
  if (typeof options === "object" && options !== null && "abortSignal" in options) {
    return options.abortSignal instanceof AbortSignal ? options.abortSignal : undefined;
  }
  return undefined;
}

beforeEach(() => {
  send.mockReset();
  destroy.mockReset();
});

describe("DescriptionService", () => {
  test("falls through failing models to the first one that answers", async () => {
    send.mockImplementation(async (command: InvokeModelCommand) => {
      if (command.input.modelId === MODELS.D) {
        return claudeReply("a red ball");
      }
      throw new Error(`${command.input.modelId} is unavailable`);
    });
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });

    const result = await service.describe(payload);

    expect(result.text).toBe("a red ball");
    expect(result.modelId).toBe(MODELS.D);
    expect(result.usage).toEqual({ promptTokens: 1200, completionTokens: 40, totalTokens: 1240 });
    expect(requestedModels()).toEqual([MODELS.A, MODELS.B, MODELS.C, MODELS.D]);
  });

  test("stops after the first model that succeeds", async () => {
    send.mockResolvedValue(claudeReply("a quiet street at dusk"));
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });

    const result = await service.describe(payload);

    expect(result.modelId).toBe(MODELS.A);
    expect(send).toHaveBeenCalledTimes(1);
  });

  test("sends the image and the prompt in the Claude message format", async () => {
    send.mockResolvedValue(claudeReply("a cat"));
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });

    await service.describe(payload);

    expect(requestBody(0)).toEqual({
      anthropic_version: "bedrock-2023-05-31",
      max_tokens: 1000,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: {
                type: "base64",
                media_type: "image/jpeg",
                data: payload.data.toString("base64"),
              },
            },
            { type: "text", text: DEFAULT_DESCRIPTION_PROMPT },
          ],
        },
      ],
    });
  });

  test("throws AllServicesUnavailableError when every model fails", async () => {
    send.mockRejectedValue(new Error("network down"));
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });

    const error = await service.describe(payload).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AllServicesUnavailableError);
    expect(error).toMatchObject({ message: "All models failed. Please try again later." });
    if (error instanceof AllServicesUnavailableError) {
      expect(error.failures.map((failure) => failure.provider)).toEqual([
        MODELS.A,
        MODELS.B,
        MODELS.C,
        MODELS.D,
      ]);
    }
    expect(send).toHaveBeenCalledTimes(4);
  });

  test("treats malformed and empty responses as failures", async () => {
    send
      .mockResolvedValueOnce({ body: new TextEncoder().encode("not json") })
      .mockResolvedValueOnce(jsonBody({ unexpected: true }))
      .mockResolvedValueOnce(claudeReply("   "))
      .mockResolvedValueOnce(claudeReply("a bowl of fruit"));
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });

    const result = await service.describe(payload);

    expect(result.text).toBe("a bowl of fruit");
    expect(result.modelId).toBe(MODELS.D);
  });

  test("moves on when a model does not answer in time", async () => {
    send
      .mockImplementationOnce(() => new Promise(() => undefined))
      .mockResolvedValueOnce(claudeReply("a lighthouse"));
    const service = new DescriptionService({
      region: "us-east-1",
      llm: llmConfig({ modelIds: [MODELS.A, MODELS.B], timeoutMs: 20 }),
    });

    const result = await service.describe(payload);

    expect(result.modelId).toBe(MODELS.B);
    expect(result.text).toBe("a lighthouse");
  });

  test("reports the timeout as the failure cause", async () => {
    send.mockImplementation(() => new Promise(() => undefined));
    const service = new DescriptionService({
      region: "us-east-1",
      llm: llmConfig({ modelIds: [MODELS.A], timeoutMs: 20 }),
    });

    const error = await service.describe(payload).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AllServicesUnavailableError);
    if (error instanceof AllServicesUnavailableError) {
      expect(error.failures[0].error).toBeInstanceOf(TimeoutError);
    }
  });

  test("aborts the request of a model that timed out", async () => {
    send
      .mockImplementationOnce(() => new Promise(() => undefined))
      .mockResolvedValueOnce(claudeReply("a lighthouse"));
    const service = new DescriptionService({
      region: "us-east-1",
      llm: llmConfig({ modelIds: [MODELS.A, MODELS.B], timeoutMs: 20 }),
    });

    await service.describe(payload);

    const [timedOut, answered] = send.mock.calls.map(
      (call: unknown[]) => abortSignalOf(call)?.aborted
    );
    expect(timedOut).toBe(true);
    expect(answered).toBe(false);
  });

  test("uses the Nova request format for Nova models", async () => {
    send.mockResolvedValue(
      jsonBody({
        output: { message: { content: [{ text: "a harbour with boats" }] } },
        usage: { inputTokens: 900, outputTokens: 30 },
      })
    );
    const service = new DescriptionService({
      region: "us-east-1",
      llm: llmConfig({ modelIds: ["amazon.nova-lite-v1:0"], maxTokens: 500 }),
    });

    const result = await service.describe(payload);

    expect(result.text).toBe("a harbour with boats");
    expect(result.usage.totalTokens).toBe(930);
    expect(requestBody(0)).toEqual({
      schemaVersion: "messages-v1",
      inferenceConfig: { max_new_tokens: 500 },
      messages: [
        {
          role: "user",
          content: [
            { image: { format: "jpeg", source: { bytes: payload.data.toString("base64") } } },
            { text: DEFAULT_DESCRIPTION_PROMPT },
          ],
        },
      ],
    });
  });

  test("accumulates token usage across calls", async () => {
    send.mockResolvedValue(claudeReply("a garden"));
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });

    await service.describe(payload);
    await service.describe(payload);

    expect(service.getTokenUsage()).toEqual({
      promptTokens: 2400,
      completionTokens: 80,
      totalTokens: 2480,
    });

    service.resetTokenUsage();
    expect(service.getTokenUsage().totalTokens).toBe(0);
  });

  test("rejects an empty model list", () => {
    expect(
      () => new DescriptionService({ region: "us-east-1", llm: llmConfig({ modelIds: [] }) })
    ).toThrow("At least one model ID is required");
  });

  test("destroy releases the client", () => {
    const service = new DescriptionService({ region: "us-east-1", llm: llmConfig() });
    service.destroy();
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});

describe("ModelFactory", () => {
  test("picks the handler family from the model id", () => {
    expect(ModelFactory.createModelHandler("anthropic.claude-3-haiku-20240307-v1:0").getModelType()).toBe(
      "claude"
    );
    expect(ModelFactory.createModelHandler("amazon.nova-lite-v1:0").getModelType()).toBe("nova");
    expect(ModelFactory.createModelHandler("some.other-model").getModelType()).toBe("claude");
  });
});
