export { consolidateName, cleanNameCandidate } from "./columns/name";
export { cleanDate } from "./columns/date";
export { cleanEvent } from "./columns/event";
export { cleanVenue, venueKey } from "./columns/venue";
export { cleanOccasion, normalizeOccasion } from "./columns/occasion";
export { cleanCurrency, cleanCurrencyCode } from "./columns/currency";
export { cleanCallNumber, splitCallNumber } from "./columns/call-number";
export type { CallNumberParts } from "./columns/call-number";
export { cleanPlace, canonicalizeStateSuffix, stripPlaceNoise } from "./columns/place";
export { asRawRecord, readColumn, readText, toInt, toText } from "./columns/values";
