import { z } from "zod";
import { Logger, getLogger } from "../../../utils/logger";
import {
  IModelHandler,
  ImageAttachment,
  InferenceSettings,
  TokenUsageData,
} from "../types/bedrock-types";

const novaResponseSchema = z.object({
  output: z.object({
    message: z.object({
      content: z.array(z.object({ text: z.string().optional() })),
    }),
  }),
  usage: z
    .object({
      inputTokens: z.number().optional(),
      outputTokens: z.number().optional(),
    })
    .optional(),
});

export class NovaModelHandler implements IModelHandler {
  private logger: Logger;

  constructor() {
    this.logger = getLogger("Nova");
    this.logger.debug("Initialized Nova model handler");
  }

  getModelType(): string {
    return "nova";
  }

  createPayload(
    prompt: string,
    image: ImageAttachment,
    settings: InferenceSettings
  ): Record<string, unknown> {
    // Nova names the codec ("jpeg") rather than the media type
    const format = image.mediaType.replace("image/", "");

    return {
      schemaVersion: "messages-v1",
      inferenceConfig: {
        max_new_tokens: settings.maxTokens,
      },
      messages: [
        {
          role: "user",
          content: [
            {
              image: {
                format,
                source: {
                  bytes: image.base64,
                },
              },
            },
            {
              text: prompt,
            },
          ],
        },
      ],
    };
  }

  extractText(response: unknown): string {
    const parsed = novaResponseSchema.safeParse(response);
    if (!parsed.success) {
      this.logger.error(
        "Unexpected Nova response structure:",
        JSON.stringify(response)?.substring(0, 200)
      );
      throw new Error("Unexpected Nova response structure");
    }

    const text = parsed.data.output.message.content
      .map((block) => block.text ?? "")
      .join("\n")
      .trim();

    if (!text) {
      throw new Error("Empty description from Nova model");
    }
    return text;
  }

  /**
   * Extract token usage from Nova response
   */
  extractTokenUsage(response: unknown): TokenUsageData {
    const parsed = novaResponseSchema.safeParse(response);
    const usage = parsed.success ? parsed.data.usage : undefined;

    if (!usage) {
      this.logger.debug("Could not determine token usage from Nova response");
      return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    }

    const promptTokens = usage.inputTokens ?? 0;
    const completionTokens = usage.outputTokens ?? 0;
    return {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
    };
  }
}
