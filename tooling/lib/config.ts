/**
 * Configuration loading and path expansion utilities
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { ActivationContext, Config } from "./types";
import { LogLevel, globalLogger, isLogLevel } from "./logger";
import { isPlainObject } from "./utils";

export const CONFIG_FILE_NAME = "derivegen.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_OUTPUT_DIR = "generated";
export const DEFAULT_RUNTIME_MODULE = "ts-derivegen";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const CAPABILITIES_ENV = "DERIVEGEN_CAPABILITIES";
export const LOG_LEVEL_ENV = "DERIVEGEN_LOG_LEVEL";

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isPlainObject(value) && Object.values(value).every((item) => typeof item === "string");
}

/**
 * Keep the recognised, well-typed fields of a parsed config file
 */
export function parseConfig(value: unknown): { config: Config; problems: string[] } {
  const config: Config = {};
  const problems: string[] = [];
  if (!isPlainObject(value)) {
    return { config, problems: ["config root must be an object"] };
  }

  const { envSearchPaths, outputDir, capabilities, generators, logLevel, imports, runtimeModule } = value;

  if (envSearchPaths !== undefined) {
    if (isStringArray(envSearchPaths)) config.envSearchPaths = envSearchPaths;
    else problems.push("envSearchPaths must be an array of strings");
  }
  if (outputDir !== undefined) {
    if (typeof outputDir === "string") config.outputDir = outputDir;
    else problems.push("outputDir must be a string");
  }
  if (capabilities !== undefined) {
    if (isStringArray(capabilities)) config.capabilities = capabilities;
    else problems.push("capabilities must be an array of strings");
  }
  if (generators !== undefined) {
    if (isStringArray(generators)) config.generators = generators;
    else problems.push("generators must be an array of strings");
  }
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) config.logLevel = logLevel;
    else problems.push("logLevel must be one of debug, info, warn, error");
  }
  if (imports !== undefined) {
    if (isStringRecord(imports)) config.imports = imports;
    else problems.push("imports must map module names to import specifiers");
  }
  if (runtimeModule !== undefined) {
    if (typeof runtimeModule === "string") config.runtimeModule = runtimeModule;
    else problems.push("runtimeModule must be a string");
  }

  return { config, problems };
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectRoot: string, configPath: string = join(projectRoot, CONFIG_FILE_NAME), env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.env = env;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, "utf8"));
    } catch (error) {
      globalLogger.warn("Ignoring unreadable config file", {
        configPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    const { config, problems } = parseConfig(raw);
    for (const problem of problems) {
      globalLogger.warn(`Ignoring config field: ${problem}`, { configPath });
    }
    return config;
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing `.env` file on the search path without overriding
   * variables that are already set. Returns the files loaded.
   */
  loadEnvFiles(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      const parsed = parseEnv(readFileSync(expanded, "utf-8"));
      for (const [key, value] of Object.entries(parsed)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  /**
   * Enabled capabilities; a comma separated DERIVEGEN_CAPABILITIES wins
   * over the config file
   */
  getCapabilities(): string[] {
    const fromEnv = this.env[CAPABILITIES_ENV];
    if (fromEnv !== undefined) {
      return fromEnv
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
    }
    return this.config.capabilities ?? [];
  }

  getActivation(): ActivationContext {
    return new Set(this.getCapabilities());
  }

  getLogLevel(): LogLevel {
    const fromEnv = this.env[LOG_LEVEL_ENV];
    if (fromEnv !== undefined && isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getOutputDir(): string {
    return this.expandPath(this.config.outputDir ?? DEFAULT_OUTPUT_DIR);
  }

  /** Generator ids to enable; undefined enables all */
  getGenerators(): string[] | undefined {
    return this.config.generators;
  }

  getImports(): Record<string, string> {
    return this.config.imports ?? {};
  }

  getRuntimeModule(): string {
    return this.config.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  }

  getConfig(): Config {
    return this.config;
  }
}
