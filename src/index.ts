#!/usr/bin/env node
import "dotenv/config";
import * as path from "path";
import * as fs from "fs";
import ImageNarrator from "./image-narrator";
import { getLogger } from "./utils/logger";
import { parseCommandLineArgs } from "./utils/command-line-parser";
import { loadNarratorConfig } from "./utils/narrator-config";
import { describeError } from "./utils/errors";

/**
 * Default audio path: the image's name with the audio extension, beside it
 */
export function defaultAudioPath(imagePath: string, format: string): string {
  const parsed = path.parse(imagePath);
  return path.join(parsed.dir, `${parsed.name}.${format}`);
}

/**
 * Main entry point for the image narrator command line
 * @returns Process exit code
 */
async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const mainLogger = getLogger("Main");

  const options = parseCommandLineArgs(args, mainLogger);
  if (options === null) {
    return args.includes("--help") || args.includes("-h") ? 0 : 1;
  }

  let narrator: ImageNarrator;
  try {
    narrator = new ImageNarrator(loadNarratorConfig({ filePath: options.configFilePath }));
  } catch (error) {
    mainLogger.error(`Failed to initialize: ${describeError(error)}`);
    mainLogger.info("💡 Please check your AWS credentials and configuration file.");
    return 1;
  }

  try {
    if (!fs.existsSync(options.imagePath)) {
      mainLogger.error(`Image file not found: ${options.imagePath}`);
      return 1;
    }

    const bytes = await fs.promises.readFile(options.imagePath);
    mainLogger.info(`🤖 Analyzing ${path.basename(options.imagePath)}...`);

    const outcome = await narrator.narrate(
      { bytes, fileName: path.basename(options.imagePath) },
      { withAudio: options.withAudio }
    );

    if (!outcome.ok) {
      mainLogger.error(outcome.error);
      mainLogger.info(`💡 ${outcome.hint}`);
      return 1;
    }

    mainLogger.info("\n📝 Image Description:\n");
    mainLogger.info(outcome.description);
    mainLogger.info(`\n(model: ${outcome.modelUsed})`);

    if (outcome.audio) {
      const audioPath =
        options.outputPath ?? defaultAudioPath(options.imagePath, outcome.audio.format);
      await fs.promises.writeFile(audioPath, outcome.audio.data);
      mainLogger.info(`🔊 Audio description saved to ${audioPath} (${outcome.audio.backend})`);
    } else if (options.withAudio) {
      mainLogger.warn("Audio could not be generated; the text description is above.");
    }

    const tokenUsage = narrator.getTokenUsage();
    mainLogger.info("\n📈 Token Usage Summary:");
    mainLogger.info(`   Prompt tokens:     ${tokenUsage.promptTokens.toLocaleString()}`);
    mainLogger.info(`   Completion tokens: ${tokenUsage.completionTokens.toLocaleString()}`);
    mainLogger.info(`   Total tokens:      ${tokenUsage.totalTokens.toLocaleString()}`);

    mainLogger.info("\n✅ Analysis completed successfully!");
    return 0;
  } catch (error) {
    mainLogger.error("Error narrating image:", error);
    return 1;
  } finally {
    narrator.close();
  }
}

// Run the main function if this script is executed directly
if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}

// Export the main function for potential programmatic use
export default main;
