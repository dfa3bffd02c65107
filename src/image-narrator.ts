import DescriptionService, { ImageDescriber } from "./services/bedrock";
import { TokenUsageData } from "./services/bedrock/types/bedrock-types";
import { decodeImage } from "./services/image/image-decoder";
import { ReduceOptions, reduceImage } from "./services/image/image-reducer";
import { EncodedPayload, SourceImage } from "./services/image/types";
import { ImageUpload, validateUpload } from "./services/image/upload";
import SpeechService from "./services/speech";
import { AudioResult, SpeechSynthesizer } from "./services/speech/types";
import {
  AllServicesUnavailableError,
  NarratorError,
  UploadTooLargeError,
  describeError,
} from "./utils/errors";
import { Logger, LogLevel, getLogger } from "./utils/logger";
import { NarratorConfig } from "./utils/narrator-config";

export const RETRY_HINT =
  "Please try uploading a different image or check your internet connection.";
export const COMPRESS_HINT = "Please compress your image or choose a smaller file.";

export type NarrationOutcome =
  | {
      ok: true;
      description: string;
      modelUsed: string;
      /** null when every speech backend failed */
      audio: AudioResult | null;
      payload: EncodedPayload;
    }
  | {
      ok: false;
      error: string;
      hint: string;
    };

export interface NarrateOptions {
  /** Skip speech synthesis and return text only */
  withAudio?: boolean;
}

export interface ImageNarratorDeps {
  describer?: ImageDescriber & { getTokenUsage?(): TokenUsageData; destroy?(): void };
  speech?: SpeechSynthesizer;
  decode?: (bytes: Buffer) => Promise<SourceImage>;
  reduceOptions?: Partial<ReduceOptions>;
}

/**
 * Image narration pipeline: validate the upload, shrink it under the
 * payload ceiling, describe it with a vision model and read it aloud
 */
class ImageNarrator {
  private logger: Logger;
  private describer: NonNullable<ImageNarratorDeps["describer"]>;
  private speech: SpeechSynthesizer;
  private decode: (bytes: Buffer) => Promise<SourceImage>;
  private reduceOptions: Partial<ReduceOptions>;
  private uploadLimitBytes: number;
  private imageCount: number = 0;

  constructor(
    config: NarratorConfig,
    deps: ImageNarratorDeps = {},
    logLevel?: LogLevel
  ) {
    this.logger = getLogger("Narrator", logLevel);
    this.uploadLimitBytes = config.uploadLimitBytes;
    this.describer =
      deps.describer ??
      new DescriptionService({ region: config.region, llm: config.llm, logLevel });
    this.speech = deps.speech ?? SpeechService.fromConfig(config.speech, { logLevel });
    this.decode = deps.decode ?? decodeImage;
    this.reduceOptions = deps.reduceOptions ?? {};

    this.logger.debug(`Image narrator initialized in ${config.region}`);
  }

  /**
   * Run the whole pipeline for one upload. Never throws: every failure
   * becomes an `{ ok: false }` outcome with a message for the user.
   */
  async narrate(upload: ImageUpload, options: NarrateOptions = {}): Promise<NarrationOutcome> {
    this.imageCount++;
    const withAudio = options.withAudio ?? true;

    try {
      const { sizeLabel } = validateUpload(upload, this.uploadLimitBytes);
      this.logger.info(`✅ Image uploaded successfully! (${sizeLabel})`);

      const image = await this.decode(upload.bytes);
      const payload = await reduceImage(image, this.reduceOptions);
      this.logger.debug(
        `Payload ${payload.width}x${payload.height} at quality ${payload.quality} after ${payload.attempts.length} attempt(s)`
      );

      const description = await this.describer.describe(payload);
      this.logger.info(`📝 Description produced by ${description.modelId}`);

      const audio = withAudio ? await this.speech.synthesize(description.text) : null;

      return {
        ok: true,
        description: description.text,
        modelUsed: description.modelId,
        audio,
        payload,
      };
    } catch (error) {
      return this.toFailure(error);
    }
  }

  private toFailure(error: unknown): NarrationOutcome {
    if (error instanceof UploadTooLargeError) {
      this.logger.error(error.message);
      return { ok: false, error: error.message, hint: COMPRESS_HINT };
    }

    if (error instanceof AllServicesUnavailableError) {
      this.logger.error(`Analysis failed: ${error.message}`);
      return { ok: false, error: `Analysis failed: ${error.message}`, hint: RETRY_HINT };
    }

    if (!(error instanceof NarratorError)) {
      this.logger.error("Unexpected error while narrating image:", error);
    }
    const message = `Analysis failed: ${describeError(error)}`;
    return { ok: false, error: message, hint: RETRY_HINT };
  }

  /**
   * Number of uploads seen so far, including rejected ones
   */
  getImageCount(): number {
    return this.imageCount;
  }

  getTokenUsage(): TokenUsageData {
    return (
      this.describer.getTokenUsage?.() ?? {
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
      }
    );
  }

  /**
   * Release network clients
   */
  close(): void {
    this.describer.destroy?.();
    this.logger.debug("Image narrator closed");
  }
}

export { LogLevel };
export default ImageNarrator;
