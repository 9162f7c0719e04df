import path from "node:path";
import fs from "node:fs";
import * as toml from "toml";
import { z } from "zod";
import { ConfigError } from "../errors";
import { configureLogging, LogSettings } from "../commons";
import { Serializer, serializerForFormat } from "../conversion/serialization";

export const CONFIG_FILE_NAME = "strata.config.toml";

/**
 * Schema of strata.config.toml. Every key is optional.
 */
export const ProjectConfigSchema = z.object({
  serialization: z
    .object({
      /** Encoding used for serializable attributes stored in blobs */
      format: z.enum(["v8", "json"]).default("v8"),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info"]).default("info"),
      structured: z.boolean().default(false),
      disabled: z.boolean().default(false),
    })
    .default({}),
});

/**
 * Project configuration from strata.config.toml
 */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type SerializationConfig = ProjectConfig["serialization"];
export type LoggingConfig = ProjectConfig["logging"];

export const DEFAULT_CONFIG: Readonly<ProjectConfig> = Object.freeze({
  serialization: Object.freeze({ format: "v8" }),
  logging: Object.freeze({ level: "info", structured: false, disabled: false }),
});

/**
 * Walks up the directory tree to find strata.config.toml
 */
export function findConfigFile(
  startDir: string = process.cwd(),
): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root directory
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

const describeIssue = (issue: z.ZodIssue): string =>
  `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`;

/**
 * Validates a parsed TOML document and fills in defaults.
 */
export function parseProjectConfig(raw: unknown): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${CONFIG_FILE_NAME}: ${result.error.issues.map(describeIssue).join("; ")}`,
    );
  }
  return result.data;
}

/**
 * Reads and parses the project configuration from strata.config.toml
 */
export function readProjectConfig(
  startDir: string = process.cwd(),
): ProjectConfig {
  const configPath = findConfigFile(startDir);
  if (!configPath) {
    throw new ConfigError(
      `${CONFIG_FILE_NAME} not found in current directory or any parent directory`,
    );
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${CONFIG_FILE_NAME}: ${error}`);
  }
  return parseProjectConfig(parsed);
}

/**
 * Like {@link readProjectConfig}, but falls back to the defaults when no
 * configuration file exists. An invalid file still throws.
 */
export function loadStrataConfig(
  startDir: string = process.cwd(),
): ProjectConfig {
  return findConfigFile(startDir) === null ?
      ProjectConfigSchema.parse({})
    : readProjectConfig(startDir);
}

/**
 * Applies the logging section to the process-wide log settings.
 */
export function applyLoggingConfig(config: ProjectConfig): void {
  const settings: LogSettings = { ...config.logging };
  configureLogging(settings);
}

export const serializerFor = (config: ProjectConfig): Serializer =>
  serializerForFormat(config.serialization.format);
