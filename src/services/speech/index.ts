import { SpeechConfig } from "../../utils/narrator-config";
import { firstSuccessful } from "../../utils/fallback-chain";
import { describeError } from "../../utils/errors";
import { Logger, LogLevel, getLogger } from "../../utils/logger";
import { GoogleSpeechBackend } from "./google-speech";
import { CommandRunner, OfflineSpeechBackend } from "./offline-speech";
import { AudioResult, ISpeechBackend, SpeechSynthesizer } from "./types";

/**
 * Turns description text into audio, falling back from one backend to the
 * next. Running out of backends is not an error: the caller gets null and
 * keeps the text.
 */
class SpeechService implements SpeechSynthesizer {
  private logger: Logger;

  constructor(
    private readonly backends: readonly ISpeechBackend[],
    logLevel?: LogLevel
  ) {
    this.logger = getLogger("Speech", logLevel);
  }

  /**
   * Network backend first, espeak second
   */
  static fromConfig(
    config: SpeechConfig,
    options: { runner?: CommandRunner; logLevel?: LogLevel } = {}
  ): SpeechService {
    return new SpeechService(
      [
        new GoogleSpeechBackend({
          language: config.language,
          slow: config.slow,
          timeoutMs: config.timeoutMs,
        }),
        new OfflineSpeechBackend({
          command: config.espeakPath,
          rate: config.rate,
          volume: config.volume,
          timeoutMs: config.timeoutMs,
          runner: options.runner,
        }),
      ],
      options.logLevel
    );
  }

  getBackendNames(): string[] {
    return this.backends.map((backend) => backend.getName());
  }

  async synthesize(text: string): Promise<AudioResult | null> {
    const outcome = await firstSuccessful(
      this.backends,
      (backend) => backend.synthesize(text),
      (backend) => backend.getName(),
      (backend, error) =>
        this.logger.warn(`Speech backend ${backend.getName()} failed: ${describeError(error)}`)
    );

    if (!outcome.ok) {
      this.logger.warn("Speech synthesis unavailable, returning text only");
      return null;
    }

    this.logger.debug(`Audio produced by ${outcome.provider.getName()}`);
    return outcome.value;
  }
}

export default SpeechService;
