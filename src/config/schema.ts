import { readFile } from "node:fs/promises";
import { z } from "zod";

const positiveInt = z.number().int().min(1);

export const configSchema = z.object({
  engine: z
    .object({
      /** Items kept per source/transform stage in preview runs */
      previewLimit: positiveInt.default(2),
      /** Items per worker dispatch for parallel steps */
      defaultChunkSize: positiveInt.default(1),
      /** Chunks in flight per worker before the pool stops pulling upstream */
      inFlightFactor: positiveInt.default(2),
      /** Workers used by the CLI when a step is marked parallel without a count */
      defaultWorkers: positiveInt.default(4),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
      format: z.enum(["compact", "hybrid", "minimal", "pretty", "json"]).default("compact"),
      sanitize: z.boolean().default(true),
      maxArrayLength: positiveInt.default(3),
      maxStringLength: positiveInt.default(500),
      maxDepth: positiveInt.default(3),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

export type EngineConfig = Config["engine"];

export const defaultConfig: Config = configSchema.parse({});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? Number.parseInt(raw, 10) : undefined;
}

function defined(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables
 * 2. Config file given by `path`, CONFIG_FILE, or ./config.json
 * 3. Schema defaults
 *
 * A missing config file is not an error; unreadable JSON is.
 */
export async function loadConfig(path?: string): Promise<Config> {
  const configPath = path || process.env.CONFIG_FILE || "./config.json";

  try {
    const fileConfig = await readConfigFile(configPath);
    const fileEngine = isRecord(fileConfig.engine) ? fileConfig.engine : {};
    const fileLogging = isRecord(fileConfig.logging) ? fileConfig.logging : {};

    const mergedConfig = {
      ...fileConfig,
      engine: {
        ...fileEngine,
        ...defined({
          previewLimit: readInt("PREVIEW_LIMIT"),
          defaultChunkSize: readInt("DEFAULT_CHUNK_SIZE"),
          inFlightFactor: readInt("IN_FLIGHT_FACTOR"),
          defaultWorkers: readInt("DEFAULT_WORKERS"),
        }),
      },
      logging: {
        ...fileLogging,
        ...defined({
          level: process.env.LOG_LEVEL || undefined,
          format: process.env.LOG_FORMAT || undefined,
          sanitize: process.env.LOG_SANITIZE ? process.env.LOG_SANITIZE !== "false" : undefined,
          maxArrayLength: readInt("LOG_MAX_ARRAY_LENGTH"),
          maxStringLength: readInt("LOG_MAX_STRING_LENGTH"),
          maxDepth: readInt("LOG_MAX_DEPTH"),
        }),
      },
    };

    return configSchema.parse(mergedConfig);
  } catch (error) {
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Publish logging settings as the environment variables the logging stack
 * reads when it is first imported, so config-file values reach the logger.
 * Environment overrides were already folded in by `loadConfig`.
 */
export function applyLoggingEnv(logging: Config["logging"], env: NodeJS.ProcessEnv = process.env): void {
  env.LOG_LEVEL = logging.level;
  env.LOG_FORMAT = logging.format;
  env.LOG_SANITIZE = String(logging.sanitize);
  env.LOG_MAX_ARRAY_LENGTH = String(logging.maxArrayLength);
  env.LOG_MAX_STRING_LENGTH = String(logging.maxStringLength);
  env.LOG_MAX_DEPTH = String(logging.maxDepth);
}
