import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError, MIB } from "./errors";
import { getLogger } from "./logger";

/**
 * Bedrock ids of the vision models to try, most capable first
 */
export const DEFAULT_MODEL_IDS: readonly string[] = [
  "anthropic.claude-3-5-sonnet-20241022-v2:0",
  "anthropic.claude-3-5-haiku-20241022-v1:0",
  "anthropic.claude-3-sonnet-20240229-v1:0",
  "anthropic.claude-3-haiku-20240307-v1:0",
];

export const DEFAULT_DESCRIPTION_PROMPT = `Please provide a detailed, accessible description of this image. Focus on:

1. Overall scene and setting
2. People, objects, and their positions
3. Colors, lighting, and visual details
4. Any text visible in the image
5. Spatial relationships (left, right, center, background, foreground)

Write in clear, descriptive language that would be helpful for someone who cannot see the image. Be specific about locations, colors, and what's happening in the scene.`;

export interface LLMConfig {
  modelIds: string[];
  maxTokens: number;
  prompt: string;
  timeoutMs: number;
}

export interface SpeechConfig {
  /** Language tag for the network backend */
  language: string;
  slow: boolean;
  timeoutMs: number;
  /** Offline backend executable */
  espeakPath: string;
  /** Words per minute */
  rate: number;
  /** 0..1 */
  volume: number;
}

export interface NarratorConfig {
  region: string;
  uploadLimitBytes: number;
  llm: LLMConfig;
  speech: SpeechConfig;
}

export function defaultNarratorConfig(): NarratorConfig {
  return {
    region: "us-east-1",
    uploadLimitBytes: 10 * MIB,
    llm: {
      modelIds: [...DEFAULT_MODEL_IDS],
      maxTokens: 1000,
      prompt: DEFAULT_DESCRIPTION_PROMPT,
      timeoutMs: 30000,
    },
    speech: {
      language: "en",
      slow: false,
      timeoutMs: 30000,
      espeakPath: "espeak",
      rate: 150,
      volume: 0.9,
    },
  };
}

/**
 * Shape of the optional JSON configuration file. Keys are snake_case and
 * every field may be left out.
 */
const configFileSchema = z
  .object({
    region: z.string().min(1),
    upload_limit_mb: z.number().positive(),
    llm_config: z
      .object({
        model_ids: z.array(z.string().min(1)).min(1),
        max_tokens: z.number().int().positive(),
        prompt: z.union([z.string().min(1), z.array(z.string()).min(1)]),
        timeout_ms: z.number().int().positive(),
      })
      .partial()
      .strict(),
    speech_config: z
      .object({
        language: z.string().min(1),
        slow: z.boolean(),
        timeout_ms: z.number().int().positive(),
        espeak_path: z.string().min(1),
        rate: z.number().int().positive(),
        volume: z.number().min(0).max(1),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type NarratorConfigFile = z.infer<typeof configFileSchema>;

const logger = getLogger("NarratorConfig");

function readConfigFile(filePath: string): NarratorConfigFile {
  const resolvedPath = path.resolve(process.cwd(), filePath);
  logger.debug(`Loading configuration from: ${resolvedPath}`);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`Configuration file not found: ${resolvedPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolvedPath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid JSON: ${resolvedPath}`, {
      cause: error,
    });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid configuration in ${resolvedPath}: ${issue.path.join(".") || "(root)"} ${issue.message}`
    );
  }
  return parsed.data;
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid value for ${name}. Must be a positive integer.`);
  }
  return parsed;
}

function applyFile(config: NarratorConfig, file: NarratorConfigFile): void {
  if (file.region) config.region = file.region;
  if (file.upload_limit_mb) config.uploadLimitBytes = Math.round(file.upload_limit_mb * MIB);

  const llm = file.llm_config;
  if (llm) {
    if (llm.model_ids) config.llm.modelIds = [...llm.model_ids];
    if (llm.max_tokens) config.llm.maxTokens = llm.max_tokens;
    if (llm.timeout_ms) config.llm.timeoutMs = llm.timeout_ms;
    if (Array.isArray(llm.prompt)) {
      config.llm.prompt = llm.prompt.join("\n");
    } else if (llm.prompt) {
      config.llm.prompt = llm.prompt;
    }
  }

  const speech = file.speech_config;
  if (speech) {
    if (speech.language) config.speech.language = speech.language;
    if (speech.slow !== undefined) config.speech.slow = speech.slow;
    if (speech.timeout_ms) config.speech.timeoutMs = speech.timeout_ms;
    if (speech.espeak_path) config.speech.espeakPath = speech.espeak_path;
    if (speech.rate) config.speech.rate = speech.rate;
    if (speech.volume !== undefined) config.speech.volume = speech.volume;
  }
}

function applyEnv(config: NarratorConfig, env: NodeJS.ProcessEnv): void {
  if (env.AWS_REGION) config.region = env.AWS_REGION;
  if (env.TIMEOUT_MS) config.llm.timeoutMs = parsePositiveInt("TIMEOUT_MS", env.TIMEOUT_MS);
  if (env.MAX_TOKENS) config.llm.maxTokens = parsePositiveInt("MAX_TOKENS", env.MAX_TOKENS);
  if (env.ESPEAK_PATH) config.speech.espeakPath = env.ESPEAK_PATH;

  if (env.NARRATOR_MODEL_IDS) {
    const modelIds = env.NARRATOR_MODEL_IDS.split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
    if (modelIds.length === 0) {
      throw new ConfigError("NARRATOR_MODEL_IDS must list at least one model id");
    }
    config.llm.modelIds = modelIds;
  }
}

/**
 * Resolve the narrator configuration once at startup.
 * Precedence, lowest first: built-in defaults, the JSON file, the environment.
 */
export function loadNarratorConfig(
  options: { filePath?: string; env?: NodeJS.ProcessEnv } = {}
): NarratorConfig {
  const config = defaultNarratorConfig();

  if (options.filePath) {
    applyFile(config, readConfigFile(options.filePath));
  }
  applyEnv(config, options.env ?? process.env);

  logger.debug(
    `Configuration resolved: region ${config.region}, ${config.llm.modelIds.length} model(s)`
  );
  return config;
}
