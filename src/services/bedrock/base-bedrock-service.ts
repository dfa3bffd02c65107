import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from "@aws-sdk/client-bedrock-runtime";
import createAwsConfig from "../../utils/aws-config";
import { withTimeout } from "../../utils/fallback-chain";
import { Logger, LogLevel, getLogger } from "../../utils/logger";
import {
  IModelHandler,
  ImageAttachment,
  InferenceSettings,
  TokenUsageData,
} from "./types/bedrock-types";

export interface BedrockServiceOptions {
  region: string;
  timeoutMs: number;
  logLevel?: LogLevel;
}

export interface InvocationResult {
  text: string;
  usage: TokenUsageData;
}

/**
 * Base Bedrock service with the client, timeouts and token accounting
 */
export abstract class BaseBedrockService {
  protected bedrockClient: BedrockRuntimeClient;
  protected logger: Logger;
  protected timeoutMs: number;

  // Track token usage
  private promptTokens: number = 0;
  private completionTokens: number = 0;
  private totalTokens: number = 0;

  constructor(options: BedrockServiceOptions) {
    this.logger = getLogger("Bedrock", options.logLevel);
    this.timeoutMs = options.timeoutMs;
    this.bedrockClient = new BedrockRuntimeClient(createAwsConfig(options.region));

    this.logger.debug(`Initialized Bedrock client for region: ${options.region}`);
  }

  /**
   * Add one response's usage to the running totals
   */
  protected trackTokenUsage(usage: TokenUsageData): void {
    this.promptTokens += usage.promptTokens;
    this.completionTokens += usage.completionTokens;
    this.totalTokens += usage.totalTokens;

    this.logger.debug(
      `Token usage for this request - Prompt: ${usage.promptTokens}, Completion: ${usage.completionTokens}`
    );
  }

  /**
   * Get current token usage statistics
   */
  getTokenUsage(): TokenUsageData {
    return {
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
      totalTokens: this.totalTokens,
    };
  }

  resetTokenUsage(): void {
    this.promptTokens = 0;
    this.completionTokens = 0;
    this.totalTokens = 0;
  }

  /**
   * Release the client's sockets
   */
  destroy(): void {
    this.bedrockClient.destroy();
  }

  /**
   * Send one image and prompt to a model and return its text
   * @param modelId The Bedrock model ID to use
   * @param handler Builds the request body and reads the response for the model family
   */
  protected async invokeModel(
    modelId: string,
    handler: IModelHandler,
    prompt: string,
    image: ImageAttachment,
    settings: InferenceSettings
  ): Promise<InvocationResult> {
    const payload = handler.createPayload(prompt, image, settings);

    const command = new InvokeModelCommand({
      modelId,
      contentType: "application/json",
      accept: "application/json",
      body: JSON.stringify(payload),
    });

    this.logger.debug(`Processing image with ${handler.getModelType()} model: ${modelId}`);
    const controller = new AbortController();
    const response = await withTimeout(
      this.bedrockClient.send(command, { abortSignal: controller.signal }),
      this.timeoutMs,
      () => controller.abort()
    );

    if (!response.body) {
      throw new Error(`Empty response body from ${modelId}`);
    }

    let responseBody: unknown;
    try {
      responseBody = JSON.parse(new TextDecoder().decode(response.body));
    } catch (error) {
      throw new Error(`Malformed response body from ${modelId}`, { cause: error });
    }
    this.logger.debug("Response received from Bedrock");

    const text = handler.extractText(responseBody);
    const usage = handler.extractTokenUsage(responseBody);
    this.trackTokenUsage(usage);

    return { text, usage };
  }
}
