/**
 * @file src/utils/env.ts
 * @description Loads environment variables from `.env` and provides typed accessors.
 *
 *   Call `initialiseEnv()` once before reading any variable. The logger and the
 *   configuration loader both do so on import.
 */

import dotenv from "dotenv";

let isInitialised = false;

/**
 * Initialise environment variables by loading the `.env` file.
 * Subsequent calls are no-ops.
 * @param path - Optional path to the env file (defaults to “.env” in the working directory).
 */
export function initialiseEnv(path?: string): void {
  if (isInitialised) return;
  dotenv.config({ path });
  isInitialised = true;
}

function assertInitialised(name: string): void {
  if (!isInitialised) {
    throw new Error(
      `Environment not initialised. Call initialiseEnv() before reading "${name}".`
    );
  }
}

/**
 * Retrieve the value of an optional environment variable, returning a default if unset.
 * @param name – The name of the environment variable to fetch.
 * @param defaultValue – Returned when the variable is not set or is blank.
 */
export function getOptional(name: string, defaultValue = ""): string {
  assertInitialised(name);
  const value = process.env[name];
  return value && value.trim() !== "" ? value.trim() : defaultValue;
}

/**
 * Retrieve a numeric environment variable.
 * @returns The parsed number, or `undefined` when the variable is unset.
 * @throws If the variable is set but is not a finite number.
 */
export function getNumber(name: string): number | undefined {
  const raw = getOptional(name);
  if (raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} is not a number: "${raw}"`);
  }
  return value;
}

/**
 * Retrieve a boolean environment variable (`true`/`false`, `1`/`0`, `yes`/`no`).
 * @throws If the variable is set to anything else.
 */
export function getBoolean(name: string, defaultValue: boolean): boolean {
  const raw = getOptional(name).toLowerCase();
  if (raw === "") return defaultValue;
  if (["true", "1", "yes"].includes(raw)) return true;
  if (["false", "0", "no"].includes(raw)) return false;
  throw new Error(`Environment variable ${name} is not a boolean: "${raw}"`);
}
