import { existsSync, readFileSync } from "fs";
import { configFileSchema, type Configuration } from "../types/config";
import { errorMessage } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { CONFIG_PATH } from "./paths";

export interface ConfigOverrides {
  headless?: boolean;
}

/**
 * Turn whatever was in config.json into a frozen Configuration.
 * Never throws: bad keys fall back to their defaults one by one.
 */
export function buildConfig(
  raw: unknown,
  overrides: ConfigOverrides = {},
  log: Logger = createLogger("config"),
): Configuration {
  const warnings: string[] = [];
  const schema = configFileSchema(warnings);

  let parsed = schema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Config is not an object, using defaults`);
    parsed = schema.safeParse({});
  }
  if (!parsed.success) throw parsed.error;

  for (const warning of warnings) {
    log.warn(`Config fallback: ${warning}`);
  }

  const file = parsed.data;
  return Object.freeze({
    watermarkText: file.doneMessageText,
    scrollBatchSize: file.scrollsCountForEachCapture,
    iterationsPerSession: file.iterationsCount,
    maxRetries: file.maxRetries,
    baseUrl: file.baseUrl.replace(/\/+$/, ""),
    headless: overrides.headless ?? file.headless,
    timing: Object.freeze({ ...file.timing }),
  });
}

/**
 * Load config.json. A missing or malformed file is not an error.
 */
export function loadConfig(
  path: string = CONFIG_PATH,
  overrides: ConfigOverrides = {},
  log: Logger = createLogger("config"),
): Configuration {
  if (!existsSync(path)) {
    log.info(`No config file at ${path}, using defaults`);
    return buildConfig({}, overrides, log);
  }

  let raw: unknown = {};
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    log.warn(`Could not parse ${path} (${errorMessage(error)}), using defaults`);
  }

  const config = buildConfig(raw, overrides, log);
  log.info(
    `Loaded ${path}: watermark="${config.watermarkText}" batch=${config.scrollBatchSize} iterations=${config.iterationsPerSession}`,
  );
  return config;
}

/** HEADLESS=1 / HEADLESS=false from the environment, if set. */
export function headlessFromEnv(env: NodeJS.ProcessEnv = process.env): boolean | undefined {
  const value = env.HEADLESS;
  if (value === undefined || value === "") return undefined;
  return !["0", "false", "no"].includes(value.toLowerCase());
}

export { DEFAULT_CONFIG, DEFAULT_TIMING, ZERO_TIMING, type Configuration, type Timing } from "../types/config";
export * from "./paths";
