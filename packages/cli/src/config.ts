/**
 * CLI defaults from the environment
 *
 * Values come from process.env, optionally seeded from a .env file in the
 * working directory. Bad values are reported and replaced by the default.
 */

import { config as loadDotenv } from "dotenv";
import { parseColor, COLORS, type RGBA } from "@qr-eyes/core";
import { isErrorCorrectionLevel, type ErrorCorrectionLevel } from "@qr-eyes/renderer";

export interface CliDefaults {
  size: number;
  level: ErrorCorrectionLevel;
  color: RGBA;
  background: RGBA | null;
  gapless: boolean;
}

export const DEFAULTS: CliDefaults = {
  size: 512,
  level: "L",
  color: COLORS.black,
  background: null,
  gapless: false,
};

type Env = Record<string, string | undefined>;

function warnInvalid(name: string, value: string): void {
  console.warn(`[config] Ignoring invalid ${name}=${JSON.stringify(value)}, using default`);
}

/**
 * Load a .env file into process.env. A missing file is not an error.
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : {});
  if (result.error && !isMissingFile(result.error)) {
    console.warn(`[config] Could not read env file: ${result.error.message}`);
  }
}

function isMissingFile(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

/**
 * Read CLI defaults from environment variables
 */
export function readDefaults(env: Env = process.env): CliDefaults {
  const defaults: CliDefaults = { ...DEFAULTS };

  const size = env.QR_EYES_SIZE;
  if (size !== undefined && size !== "") {
    const parsed = Number(size);
    if (Number.isFinite(parsed) && parsed > 0) {
      defaults.size = parsed;
    } else {
      warnInvalid("QR_EYES_SIZE", size);
    }
  }

  const level = env.QR_EYES_LEVEL;
  if (level !== undefined && level !== "") {
    const upper = level.toUpperCase();
    if (isErrorCorrectionLevel(upper)) {
      defaults.level = upper;
    } else {
      warnInvalid("QR_EYES_LEVEL", level);
    }
  }

  const color = env.QR_EYES_COLOR;
  if (color !== undefined && color !== "") {
    const parsed = parseColor(color);
    if (parsed) {
      defaults.color = parsed;
    } else {
      warnInvalid("QR_EYES_COLOR", color);
    }
  }

  const background = env.QR_EYES_BACKGROUND;
  if (background !== undefined && background !== "") {
    const parsed = parseColor(background);
    if (parsed) {
      defaults.background = parsed;
    } else {
      warnInvalid("QR_EYES_BACKGROUND", background);
    }
  }

  const gapless = env.QR_EYES_GAPLESS;
  if (gapless !== undefined && gapless !== "") {
    defaults.gapless = gapless.toLowerCase() === "true";
  }

  return defaults;
}
