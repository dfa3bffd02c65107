import { z } from "zod";
import { Logger, getLogger } from "../../../utils/logger";
import {
  IModelHandler,
  ImageAttachment,
  InferenceSettings,
  TokenUsageData,
} from "../types/bedrock-types";

const claudeResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullish(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export class ClaudeModelHandler implements IModelHandler {
  private logger: Logger;

  constructor(private readonly modelId: string) {
    this.logger = getLogger("Claude");
    this.logger.debug(`Initialized Claude model handler for ${modelId}`);
  }

  getModelType(): string {
    return "claude";
  }

  createPayload(
    prompt: string,
    image: ImageAttachment,
    settings: InferenceSettings
  ): Record<string, unknown> {
    return {
      anthropic_version: "bedrock-2023-05-31",
      max_tokens: settings.maxTokens,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: {
                type: "base64",
                media_type: image.mediaType,
                data: image.base64,
              },
            },
            { type: "text", text: prompt },
          ],
        },
      ],
    };
  }

  extractText(response: unknown): string {
    const parsed = claudeResponseSchema.safeParse(response);
    if (!parsed.success) {
      this.logger.debug(
        "Unexpected Claude response structure:",
        JSON.stringify(response)?.substring(0, 200)
      );
      throw new Error(`Unexpected Claude response structure from ${this.modelId}`);
    }

    const text = parsed.data.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("\n")
      .trim();

    if (!text) {
      throw new Error(`Empty description from ${this.modelId}`);
    }
    if (parsed.data.stop_reason === "max_tokens") {
      this.logger.debug("Description was cut off at the token limit");
    }
    return text;
  }

  /**
   * Extract token usage from Claude response
   */
  extractTokenUsage(response: unknown): TokenUsageData {
    const parsed = claudeResponseSchema.safeParse(response);
    const promptTokens = parsed.success ? parsed.data.usage?.input_tokens ?? 0 : 0;
    const completionTokens = parsed.success ? parsed.data.usage?.output_tokens ?? 0 : 0;

    if (!parsed.success || !parsed.data.usage) {
      this.logger.debug("Could not determine token usage from Claude response");
    }

    return {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
    };
  }
}
