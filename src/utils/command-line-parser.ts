import { Logger, getLogger } from "./logger";

/**
 * Options for the image narrator command line
 */
export interface CommandLineOptions {
  imagePath: string;
  outputPath?: string;
  configFilePath?: string;
  withAudio: boolean;
}

/**
 * Parse command line arguments for the image narrator
 * @param args Command line arguments array (typically process.argv.slice(2))
 * @param logger Optional logger for error messages
 * @returns Parsed options object or null if invalid arguments or help requested
 */
export function parseCommandLineArgs(
  args: string[],
  logger?: Logger
): CommandLineOptions | null {
  const log = logger || getLogger("CommandLineParser");
  let imagePath: string | undefined;
  let outputPath: string | undefined;
  let configFilePath: string | undefined;
  let withAudio = true;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out" || arg === "-o") {
      outputPath = args[++i]?.trim();
      if (!outputPath) {
        log.error("Invalid value for --out. Must be a non-empty path.");
        return null;
      }
    } else if (arg === "--config" || arg === "-c") {
      configFilePath = args[++i]?.trim();
      if (!configFilePath) {
        log.error("Invalid value for --config. Must be a non-empty string.");
        return null;
      }
    } else if (arg === "--no-audio") {
      withAudio = false;
    } else if (arg === "--help" || arg === "-h") {
      printHelp();
      return null;
    } else if (arg.startsWith("-")) {
      log.error(`Unknown option: ${arg}`);
      return null;
    } else if (imagePath === undefined) {
      imagePath = arg;
    } else {
      log.error(`Unexpected argument: ${arg}`);
      return null;
    }
  }

  if (!imagePath) {
    log.error("Missing image path. Run with --help for usage.");
    return null;
  }

  return { imagePath, outputPath, configFilePath, withAudio };
}

/**
 * Print help information for the command line interface
 */
export function printHelp(): void {
  console.log(`
Image Narrator - accessible image descriptions with audio

Usage: image-narrator <image> [options]

Supported formats: PNG, JPG, JPEG, BMP, WEBP (10MB max)

Options:
  --out, -o <file>      Where to write the audio (default: next to the image)
  --config, -c <file>   JSON configuration file
  --no-audio            Only print the description
  --help, -h            Show this help message
  `);
}
