import { EncodedPayload } from "../../image/types";

/**
 * Interface for token usage data
 */
export interface TokenUsageData {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type ImageMediaType = EncodedPayload["mediaType"];

/**
 * Image attached to a user message
 */
export interface ImageAttachment {
  base64: string;
  mediaType: ImageMediaType;
}

export interface InferenceSettings {
  maxTokens: number;
}

/**
 * Interface for model-family specific request and response handling
 */
export interface IModelHandler {
  /**
   * Get the family of model this handler is for
   */
  getModelType(): string;

  /**
   * Create the API payload specific to this model family
   */
  createPayload(
    prompt: string,
    image: ImageAttachment,
    settings: InferenceSettings
  ): Record<string, unknown>;

  /**
   * Extract the generated text; throws on a malformed or empty response
   */
  extractText(response: unknown): string;

  /**
   * Extract token usage from response in model-specific format
   */
  extractTokenUsage(response: unknown): TokenUsageData;
}

/**
 * Text produced by one of the description models
 */
export interface DescriptionResult {
  text: string;
  modelId: string;
  usage: TokenUsageData;
}
