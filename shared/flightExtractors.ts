import {
  NOT_FOUND,
  type FlightFields,
  type FlightRecord,
  type SearchQuery,
} from "./flights";

// Earlier entries win when a listing mentions more than one carrier.
export const KNOWN_AIRLINES = [
  "IndiGo",
  "Air India",
  "SpiceJet",
  "GoAir",
  "Vistara",
  "AirAsia",
] as const;

// Carrier codes mix letters and digits (6E, G8, I5), but are never two digits.
// No word boundary: innerText often glues the code to the carrier name.
const FLIGHT_NUMBER_PATTERN = /([A-Z][A-Z0-9]|[0-9][A-Z])\s*-?\s*(\d{3,4})/;
const PRICE_PATTERN = /₹\s*([\d,]+)/;
const CLOCK_TIME_PATTERN = /(\d{1,2}):(\d{2})/g;

const findClockTimes = (text: string): string[] =>
  Array.from(text.matchAll(CLOCK_TIME_PATTERN), (match) => `${match[1]}:${match[2]}`);

export function extractAirline(text: string): string {
  const haystack = text.toLowerCase();
  const airline = KNOWN_AIRLINES.find((name) => haystack.includes(name.toLowerCase()));
  return airline ?? NOT_FOUND;
}

export function extractFlightNumber(text: string): string {
  const match = FLIGHT_NUMBER_PATTERN.exec(text);
  return match ? `${match[1]}-${match[2]}` : NOT_FOUND;
}

export function extractPrice(text: string): string {
  const match = PRICE_PATTERN.exec(text);
  return match ? `₹${match[1]}` : NOT_FOUND;
}

export function extractDepartureTime(text: string): string {
  return findClockTimes(text)[0] ?? NOT_FOUND;
}

/**
 * Returns the second clock time in the text. Listings print departure before
 * arrival, so the position is all this relies on; it does not check that the
 * second time is actually later than the first.
 */
export function extractArrivalTime(text: string): string {
  return findClockTimes(text)[1] ?? NOT_FOUND;
}

export function extractFlightFields(text: string): FlightFields {
  return {
    airline: extractAirline(text),
    flightNumber: extractFlightNumber(text),
    departureTime: extractDepartureTime(text),
    arrivalTime: extractArrivalTime(text),
    price: extractPrice(text),
  };
}

export function buildFlightRecord(
  text: string,
  query: SearchQuery,
  searchTimestamp: string,
): FlightRecord {
  return {
    ...extractFlightFields(text),
    origin: query.origin,
    destination: query.destination,
    searchTimestamp,
  };
}

// Listings with neither a time nor a fare are layout noise.
export const isUsableFlightRecord = (record: FlightFields): boolean =>
  record.departureTime !== NOT_FOUND || record.price !== NOT_FOUND;
