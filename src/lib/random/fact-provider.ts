/**
 * Seeded source of every stochastic choice made during one generation run.
 *
 * Each provider owns its own faker instance, so two providers built from the
 * same seed replay the same draws no matter what else in the process touches
 * the shared `faker` export or `Math.random`.
 */

import { Faker, base, en } from "@faker-js/faker";
import { logger } from "../../utils/logger.js";
import { resolveSeed, type SeedSource } from "../../utils/seed-manager.js";

export type DateInput = Date | string;

/** A value paired with its relative weight */
export type Weighted<T> = readonly [value: T, weight: number];

export class FactProvider {
  private readonly faker: Faker;

  constructor(
    public readonly seed: number,
    public readonly seedSource: SeedSource = "provided",
  ) {
    this.faker = new Faker({ locale: [en, base] });
    this.faker.seed(seed);
  }

  /**
   * Uniform integer in the inclusive range [lo, hi]
   */
  integerInRange(lo: number, hi: number): number {
    if (!Number.isInteger(lo) || !Number.isInteger(hi)) {
      throw new RangeError(`Integer bounds expected, got [${lo}, ${hi}]`);
    }
    if (lo > hi) {
      throw new RangeError(`Empty range [${lo}, ${hi}]`);
    }
    if (lo === hi) return lo;
    return this.faker.number.int({ min: lo, max: hi });
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot choose from an empty set");
    }
    return this.faker.helpers.arrayElement(items);
  }

  /**
   * Distinct elements drawn without replacement
   */
  sample<T>(items: readonly T[], count: number): T[] {
    if (count < 0 || count > items.length) {
      throw new RangeError(
        `Cannot sample ${count} distinct values from ${items.length}`,
      );
    }
    return this.faker.helpers.arrayElements(items, count);
  }

  weightedChoice<T>(weights: readonly Weighted<T>[]): T {
    if (weights.length === 0) {
      throw new RangeError("Cannot choose from an empty distribution");
    }
    for (const [, weight] of weights) {
      if (!(weight > 0)) {
        throw new RangeError(`Weights must be positive, got ${weight}`);
      }
    }
    return this.faker.helpers.weightedArrayElement(
      weights.map(([value, weight]) => ({ value, weight })),
    );
  }

  /**
   * True with the given probability; 0 and 1 are exact and draw nothing
   */
  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.faker.number.float({ min: 0, max: 1 }) < probability;
  }

  /**
   * Calendar date (YYYY-MM-DD) between two instants, inclusive
   */
  dateInRange(from: DateInput, to: DateInput): string {
    return this.faker.date
      .between({ from, to })
      .toISOString()
      .slice(0, 10);
  }

  /**
   * Date-time on a working hour (06:00 to 18:00), Central European offset
   */
  dateTimeInRange(from: DateInput, to: DateInput): string {
    const date = this.dateInRange(from, to);
    const hour = this.integerInRange(6, 18);
    return `${date}T${String(hour).padStart(2, "0")}:00:00+01:00`;
  }

  personName(): { given: string; family: string } {
    return {
      given: this.faker.person.firstName(),
      family: this.faker.person.lastName(),
    };
  }
}

/**
 * Create a provider; without a seed one is drawn from system entropy and logged
 */
export function createFactProvider(seed?: number | string): FactProvider {
  const resolved = resolveSeed(seed);
  if (resolved.source === "entropy") {
    logger.info("No seed given, drew one from system entropy", {
      seed: resolved.seed,
    });
  } else {
    logger.debug("Fact provider seeded", { seed: resolved.seed });
  }
  return new FactProvider(resolved.seed, resolved.source);
}
