/**
 * Round-robin assignment of donors to collections
 */

export function collectionIndexFor(donorIndex: number, collections: number): number {
  return donorIndex % collections;
}

/**
 * Donors each collection receives; all positive whenever donors >= collections
 */
export function donorsPerCollection(donors: number, collections: number): number[] {
  const base = Math.floor(donors / collections);
  const remainder = donors % collections;
  return Array.from({ length: collections }, (_, i) => base + (i < remainder ? 1 : 0));
}
