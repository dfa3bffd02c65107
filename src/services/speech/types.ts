export type AudioFormat = "mp3" | "wav";

export interface AudioResult {
  data: Buffer;
  format: AudioFormat;
  mediaType: "audio/mpeg" | "audio/wav";
  /** Name of the backend that produced the audio */
  backend: string;
}

/**
 * A text-to-speech engine. Implementations reject on any failure so the
 * next backend in line can take over.
 */
export interface ISpeechBackend {
  getName(): string;
  synthesize(text: string): Promise<AudioResult>;
}

/**
 * Anything that can read a description aloud; null means no audio
 */
export interface SpeechSynthesizer {
  synthesize(text: string): Promise<AudioResult | null>;
}
