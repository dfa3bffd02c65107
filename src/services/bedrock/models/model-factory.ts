import { IModelHandler } from "../types/bedrock-types";
import { ClaudeModelHandler } from "./claude-model";
import { NovaModelHandler } from "./nova-model";
import { Logger, getLogger } from "../../../utils/logger";

export class ModelFactory {
  private static logger: Logger = getLogger("ModelFactory");

  /**
   * Create the appropriate model handler based on the model ID
   * @param modelId The Bedrock model ID or inference profile
   */
  static createModelHandler(modelId: string): IModelHandler {
    if (modelId.includes("claude")) {
      return new ClaudeModelHandler(modelId);
    } else if (modelId.includes("amazon.nova")) {
      return new NovaModelHandler();
    } else {
      this.logger.warn(`No specific handler for model ${modelId}, using the Claude message format`);
      return new ClaudeModelHandler(modelId);
    }
  }
}
