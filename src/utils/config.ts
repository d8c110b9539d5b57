// Runtime configuration read from the environment. Tests load .env through the jest setup.
import path from "path";

const DEFAULT_STORE_DIR = ".fixtures";

/**
 * Whether FIXTURES_DEBUG asks for debug output ("true" or "1").
 */
export function isDebugEnabled(): boolean {
  const envValue = process.env.FIXTURES_DEBUG;
  if (!envValue) {
    return false;
  }
  const normalized = envValue.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
}

/**
 * Raw FIXTURES_SEED value, or undefined when unset or blank.
 */
export function getSeedSetting(): string | undefined {
  const envValue = process.env.FIXTURES_SEED;
  if (!envValue || !envValue.trim()) {
    return undefined;
  }
  return envValue.trim();
}

/**
 * Directory used by file-backed stores when no path is given.
 * Relative values resolve against the working directory.
 */
export function getStoreDir(): string {
  const envValue = process.env.FIXTURES_STORE_DIR;
  if (envValue && envValue.trim()) {
    return path.resolve(process.cwd(), envValue.trim());
  }
  return path.resolve(process.cwd(), DEFAULT_STORE_DIR);
}
