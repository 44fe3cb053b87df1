/**
 * Controlled vocabularies of the cleaned menu table.
 *
 * Both lists are closed sets: the cleaning pipeline never writes a value
 * outside of them (venue may be null, currency_code may be null).
 */

/**
 * Venue category of a menu.
 * - COMMERCIAL:   restaurants, hotels, cafés open to the public
 * - SOCIAL:       clubs, societies, private dinners
 * - GOVERNMENT:   official and diplomatic functions
 * - MILITARY:     army and navy messes, naval vessels
 * - EDUCATIONAL:  colleges, schools, alumni associations
 * - PROFESSIONAL: trade and professional associations
 * - FOREIGN:      venues abroad (foreign hotels and restaurants)
 */
export const VENUE_CATEGORIES = [
  "COMMERCIAL",
  "SOCIAL",
  "GOVERNMENT",
  "MILITARY",
  "EDUCATIONAL",
  "PROFESSIONAL",
  "FOREIGN",
] as const;

export type VenueCategory = (typeof VENUE_CATEGORIES)[number];

/**
 * ISO 4217 codes that occur in the dataset, including the pre-euro
 * currencies (BEF, DEM, FRF, ...) that historical menus are priced in.
 */
export const CURRENCY_CODES = [
  "USD",
  "GBP",
  "EUR",
  "JPY",
  "BEF",
  "CAD",
  "CZK",
  "AED",
  "DEM",
  "GRD",
  "NLG",
  "FRF",
  "HUF",
  "IEP",
  "SEK",
  "ITL",
  "FIM",
  "TWD",
  "ESP",
  "GTQ",
  "SAR",
  "PEN",
  "PLN",
] as const;

export type CurrencyCode = (typeof CURRENCY_CODES)[number];

const VENUE_SET: ReadonlySet<string> = new Set(VENUE_CATEGORIES);
const CURRENCY_SET: ReadonlySet<string> = new Set(CURRENCY_CODES);

export function isVenueCategory(value: unknown): value is VenueCategory {
  return typeof value === "string" && VENUE_SET.has(value);
}

export function isCurrencyCode(value: unknown): value is CurrencyCode {
  return typeof value === "string" && CURRENCY_SET.has(value);
}
