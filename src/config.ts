/**
 * Import Driver Configuration
 *
 * Configured via .env and .env.production files.
 * Always loads .env first, then .env.production overrides in production mode.
 * This ensures keys defined in .env but not in .env.production are still available.
 */

import dotenv from "dotenv";
import path from "path";
import chalk from "chalk";

export interface DriverConfig {
  /** Envio CLI executable */
  ENVIO_BIN: string;
  /** Directory that receives one sub-directory per indexer project */
  PROJECTS_DIR: string;
  /** Fallback explorer endpoint for contracts without their own */
  ENVIO_API_URL: string;
  /** HyperSync token typed into the wizard when it asks for one */
  HYPERSYNC_API_TOKEN: string | undefined;
  WIZARD_READ_TIMEOUT_MS: number;
  WIZARD_POLL_DELAY_MS: number;
  WIZARD_MAX_IDLE_READS: number;
  WIZARD_EXIT_TIMEOUT_MS: number;
  /** Optional JSON file replacing the built-in prompt table */
  PROMPT_TABLE_PATH: string | undefined;
  DEBUG: boolean;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `\n❌ ${key} must be a positive integer (got "${raw}")\n` +
        "Fix it in your .env (or .env.production) file, e.g.:\n" +
        `  ${key}=${fallback}\n`
    );
  }
  return value;
}

/**
 * Build the driver configuration from an environment map.
 * Kept separate from the dotenv loading so it can be exercised directly.
 */
export function parseConfig(env: NodeJS.ProcessEnv): DriverConfig {
  const DEBUG = env.DEBUG;

  return {
    ENVIO_BIN: env.ENVIO_BIN || "envio",
    PROJECTS_DIR: path.resolve(env.PROJECTS_DIR || "indexers"),
    ENVIO_API_URL: env.ENVIO_API_URL || "https://envio.dev/api",
    HYPERSYNC_API_TOKEN: env.HYPERSYNC_API_TOKEN || undefined,
    WIZARD_READ_TIMEOUT_MS: parsePositiveInt(env, "WIZARD_READ_TIMEOUT_MS", 2000),
    WIZARD_POLL_DELAY_MS: parsePositiveInt(env, "WIZARD_POLL_DELAY_MS", 250),
    WIZARD_MAX_IDLE_READS: parsePositiveInt(env, "WIZARD_MAX_IDLE_READS", 30),
    WIZARD_EXIT_TIMEOUT_MS: parsePositiveInt(env, "WIZARD_EXIT_TIMEOUT_MS", 10000),
    PROMPT_TABLE_PATH: env.PROMPT_TABLE_PATH || undefined,
    DEBUG: DEBUG?.toLowerCase() === "true" || DEBUG === "1",
  };
}

let cachedConfig: DriverConfig | null = null;

/**
 * Load .env files once and return the parsed configuration
 */
export function getConfig(): DriverConfig {
  if (cachedConfig) return cachedConfig;

  const isProduction = process.env.APP_ENV === "production";

  // Always load .env first as base configuration
  const baseResult = dotenv.config({
    path: path.resolve(process.cwd(), ".env"),
  });
  if (baseResult.error) {
    console.warn(chalk.yellow(`⚠️  Warning: .env not found, using defaults`));
  }

  // In production, override with .env.production values
  if (isProduction) {
    const prodResult = dotenv.config({
      path: path.resolve(process.cwd(), ".env.production"),
      override: true,
    });
    if (prodResult.error) {
      console.warn(
        chalk.yellow(
          `⚠️  Warning: .env.production not found, using .env values only`
        )
      );
    }
  }

  cachedConfig = parseConfig(process.env);
  console.log(
    chalk.gray(
      `Import Driver Config: ${isProduction ? "Production" : "Development"} mode`
    )
  );
  return cachedConfig;
}
