/**
 * Environment file (.env) reader.
 *
 * Settings for every process are read from one .env file:
 * - Parse raw .env content into key-value records
 * - Read .env from disk with a configurable path
 */

import { readFile } from "fs/promises";
import { join } from "path";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record representing parsed .env contents */
export type EnvRecord = Record<string, string>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Read and parse a .env file from disk.
 * Returns an empty record if the file does not exist.
 *
 * @param envPath - Absolute path to the .env file. Defaults to process.cwd()/.env
 */
export async function readEnv(envPath?: string): Promise<EnvRecord> {
  const filePath = envPath ?? join(process.cwd(), ".env");
  try {
    return parseEnvFile(await readFile(filePath, "utf-8"));
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse a .env file string into a key-value record.
 * Handles KEY=VALUE lines and an optional `export ` prefix; ignores blank lines and comments.
 * Keeps empty values (KEY= produces { KEY: "" }). Matching single or double quotes around a value are removed.
 */
export function parseEnvFile(content: string): EnvRecord {
  const result: EnvRecord = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim().replace(/^export\s+/, "");
    if (!key) continue;
    result[key] = unquote(trimmed.slice(eqIndex + 1).trim());
  }
  return result;
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === "\"" || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
