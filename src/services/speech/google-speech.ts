import { getAllAudioBase64 } from "google-tts-api";
import { Logger, getLogger } from "../../utils/logger";
import { AudioResult, ISpeechBackend } from "./types";

export interface GoogleSpeechOptions {
  language: string;
  slow: boolean;
  timeoutMs: number;
}

/**
 * Network speech backend using the Google Translate text-to-speech endpoint.
 * The endpoint caps each request at 200 characters, so the text is sent in
 * chunks and the MP3 frames are concatenated.
 */
export class GoogleSpeechBackend implements ISpeechBackend {
  private logger: Logger;

  constructor(private readonly options: GoogleSpeechOptions) {
    this.logger = getLogger("GoogleSpeech");
  }

  getName(): string {
    return "google-tts";
  }

  async synthesize(text: string): Promise<AudioResult> {
    const chunks = await getAllAudioBase64(text, {
      lang: this.options.language,
      slow: this.options.slow,
      timeout: this.options.timeoutMs,
    });

    if (chunks.length === 0) {
      throw new Error("Google TTS returned no audio");
    }
    this.logger.debug(`Received ${chunks.length} audio chunk(s)`);

    return {
      data: Buffer.concat(chunks.map((chunk) => Buffer.from(chunk.base64, "base64"))),
      format: "mp3",
      mediaType: "audio/mpeg",
      backend: this.getName(),
    };
  }
}
