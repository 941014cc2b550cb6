import crypto from "crypto";

/** Largest seed accepted by the Mersenne Twister behind faker */
export const MAX_SEED = 0xffffffff;

export type SeedSource = "provided" | "entropy";

export interface ResolvedSeed {
  seed: number;
  source: SeedSource;
}

export function hashStringToSeed(seed: string): number {
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters as an unsigned 32-bit seed
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): number {
  return crypto.randomBytes(4).readUInt32BE(0);
}

export function validateSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED;
}

/**
 * Normalize a user seed to a numeric one, or draw one from system entropy
 */
export function resolveSeed(seed?: number | string): ResolvedSeed {
  if (seed === undefined) {
    return { seed: generateRandomSeed(), source: "entropy" };
  }

  if (typeof seed === "number" && validateSeed(seed)) {
    return { seed, source: "provided" };
  }

  return { seed: hashStringToSeed(String(seed)), source: "provided" };
}
