import { readFileSync, existsSync } from "fs";
import { join, resolve } from "path";
import { HomeDirectoryError } from "../annotations/errors.js";
import { type Config, ConfigSchema, DEFAULT_CONFIG } from "./schema.js";

const CONFIG_FILENAME = ".annotate.json";
const ANNOTATIONS_FILENAME = ".annotations";

export function getHomeDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME;
  if (!home) {
    throw new HomeDirectoryError();
  }
  return home;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getHomeDirectory(env), CONFIG_FILENAME);
}

/**
 * The fixed store location, `$HOME/.annotations`.
 */
export function resolveAnnotationsPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getHomeDirectory(env), ANNOTATIONS_FILENAME);
}

export function expandPath(path: string, env: NodeJS.ProcessEnv = process.env): string {
  if (path.startsWith("~/")) {
    return join(getHomeDirectory(env), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(getHomeDirectory(env), path.slice(6));
  }
  return resolve(path);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = getConfigPath(env);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
  return ConfigSchema.parse(parsed);
}

export function resolveStorePath(config: Config, env: NodeJS.ProcessEnv = process.env): string {
  if (config.annotationsFile === DEFAULT_CONFIG.annotationsFile) {
    return resolveAnnotationsPath(env);
  }
  return expandPath(config.annotationsFile, env);
}

export function getLogFilePath(config: Config, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return config.logFile ? expandPath(config.logFile, env) : undefined;
}

export * from "./schema.js";
