import { execFile } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { promisify } from "util";
import { withTempDir } from "../../utils/temp-file";
import { Logger, getLogger } from "../../utils/logger";
import { AudioResult, ISpeechBackend } from "./types";

const execFileAsync = promisify(execFile);

/**
 * Runs an external program to completion, rejecting on a non-zero exit
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<void>;

export const runCommand: CommandRunner = async (command, args, options) => {
  await execFileAsync(command, args, { timeout: options.timeoutMs });
};

export interface OfflineSpeechOptions {
  command: string;
  /** Words per minute */
  rate: number;
  /** 0..1, mapped onto espeak's amplitude where 100 is normal */
  volume: number;
  timeoutMs: number;
  runner?: CommandRunner;
}

/**
 * Local speech backend driving espeak. Text goes in through a file and the
 * WAV comes back through another, both inside a temp directory that is
 * removed once the audio has been read.
 */
export class OfflineSpeechBackend implements ISpeechBackend {
  private logger: Logger;
  private runner: CommandRunner;

  constructor(private readonly options: OfflineSpeechOptions) {
    this.logger = getLogger("OfflineSpeech");
    this.runner = options.runner ?? runCommand;
  }

  getName(): string {
    return "espeak";
  }

  buildArgs(inputPath: string, outputPath: string): string[] {
    return [
      "-s",
      String(Math.round(this.options.rate)),
      "-a",
      String(Math.round(this.options.volume * 100)),
      "-f",
      inputPath,
      "-w",
      outputPath,
    ];
  }

  async synthesize(text: string): Promise<AudioResult> {
    return withTempDir(async (dir) => {
      const inputPath = path.join(dir, "description.txt");
      const outputPath = path.join(dir, "description.wav");
      await fs.promises.writeFile(inputPath, text, "utf8");

      this.logger.debug(`Running ${this.options.command} into ${outputPath}`);
      await this.runner(this.options.command, this.buildArgs(inputPath, outputPath), {
        timeoutMs: this.options.timeoutMs,
      });

      const data = await fs.promises.readFile(outputPath);
      if (data.length === 0) {
        throw new Error(`${this.options.command} produced an empty audio file`);
      }

      return {
        data,
        format: "wav",
        mediaType: "audio/wav",
        backend: this.getName(),
      };
    });
  }
}
