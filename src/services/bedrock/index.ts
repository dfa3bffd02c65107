import { BaseBedrockService, InvocationResult } from "./base-bedrock-service";
import { ModelFactory } from "./models/model-factory";
import { LogLevel } from "../../utils/logger";
import { LLMConfig } from "../../utils/narrator-config";
import { AllServicesUnavailableError, describeError } from "../../utils/errors";
import { firstSuccessful } from "../../utils/fallback-chain";
import { EncodedPayload } from "../image/types";
import { DescriptionResult } from "./types/bedrock-types";

/**
 * Anything that can turn an encoded image into a description
 */
export interface ImageDescriber {
  describe(payload: EncodedPayload): Promise<DescriptionResult>;
}

/**
 * Describes images with Bedrock vision models, walking the configured
 * model list until one answers
 */
class DescriptionService extends BaseBedrockService implements ImageDescriber {
  private readonly modelIds: readonly string[];
  private readonly prompt: string;
  private readonly maxTokens: number;

  constructor(
    options: {
      region: string;
      llm: LLMConfig;
      logLevel?: LogLevel;
    }
  ) {
    super({
      region: options.region,
      timeoutMs: options.llm.timeoutMs,
      logLevel: options.logLevel,
    });

    if (options.llm.modelIds.length === 0) {
      throw new Error("At least one model ID is required");
    }

    this.modelIds = [...options.llm.modelIds];
    this.prompt = options.llm.prompt;
    this.maxTokens = options.llm.maxTokens;

    this.logger.info(
      `Initializing DescriptionService with models: ${this.modelIds.join(", ")}`
    );
  }

  /**
   * Describe an image, trying each model once in priority order
   * @throws AllServicesUnavailableError when every model fails
   */
  async describe(payload: EncodedPayload): Promise<DescriptionResult> {
    const image = {
      base64: payload.data.toString("base64"),
      mediaType: payload.mediaType,
    };

    const outcome = await firstSuccessful<string, InvocationResult>(
      this.modelIds,
      (modelId) =>
        this.invokeModel(
          modelId,
          ModelFactory.createModelHandler(modelId),
          this.prompt,
          image,
          { maxTokens: this.maxTokens }
        ),
      (modelId) => modelId,
      (modelId, error) =>
        this.logger.warn(`Model ${modelId} failed: ${describeError(error)}`)
    );

    if (!outcome.ok) {
      this.logger.error("All description models failed");
      throw new AllServicesUnavailableError(outcome.failures);
    }

    this.logger.debug(`Description produced by ${outcome.provider}`);
    return {
      text: outcome.value.text,
      modelId: outcome.provider,
      usage: outcome.value.usage,
    };
  }
}

export default DescriptionService;
