import type { FactProvider } from "../random/fact-provider.js";
import { COUNTRIES, citiesOf } from "../registries/places.js";

/** Where a biobank and its juristic person are located */
export interface Site {
  country: string;
  city: string;
}

/**
 * One site per biobank. Countries are distinct until the table runs out,
 * then cycle in the drawn order.
 */
export function drawSites(count: number, provider: FactProvider): Site[] {
  const distinct = provider.sample(COUNTRIES, Math.min(count, COUNTRIES.length));
  const sites: Site[] = [];
  for (let i = 0; i < count; i++) {
    const country = distinct[i % distinct.length] ?? "CZ";
    sites.push({ country, city: provider.choice(citiesOf(country)) });
  }
  return sites;
}
