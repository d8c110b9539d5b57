// Seed resolution for generator registries.
import { getSeedSetting } from "../utils/config";
import { debug } from "../utils/logger";

// Used when FIXTURES_SEED is unset so that generated values repeat run to run.
export const DEFAULT_SEED = 642;

const seedCache: Map<string, number> = new Map();

/**
 * Derives a stable 31-bit seed from an arbitrary string using 32-bit FNV-1a.
 */
export function deriveSeed(input: string): number {
  const cached = seedCache.get(input);
  if (cached !== undefined) {
    return cached;
  }

  const FNV_OFFSET_BASIS = 2166136261;
  const FNV_PRIME = 16777619;
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }

  const seed = hash % 2147483647;
  seedCache.set(input, seed);
  return seed;
}

/**
 * Turns a seed setting into a number. Non-negative integers are used as-is,
 * any other text is hashed, and a missing setting falls back to DEFAULT_SEED.
 */
export function resolveSeed(setting: string | undefined = getSeedSetting()): number {
  if (setting === undefined) {
    return DEFAULT_SEED;
  }

  if (/^\d+$/.test(setting)) {
    const parsed = parseInt(setting, 10);
    if (Number.isSafeInteger(parsed)) {
      return parsed;
    }
  }

  const seed = deriveSeed(setting);
  debug("seed", `derived seed ${seed} from "${setting}"`);
  return seed;
}

/**
 * Clears memoized seed derivations.
 */
export function resetSeedCache(): void {
  seedCache.clear();
}
