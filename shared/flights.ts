import { z } from "zod";

export const NOT_FOUND = "N/A";

export interface FlightRecord {
  airline: string;
  flightNumber: string;
  departureTime: string;
  arrivalTime: string;
  price: string;
  origin: string;
  destination: string;
  searchTimestamp: string;
}

export type FlightTemplate = Omit<FlightRecord, "origin" | "destination" | "searchTimestamp">;

export type FlightFields = FlightTemplate;

export interface SearchQuery {
  readonly origin: string;
  readonly destination: string;
  readonly journeyDate: string;
}

export type FallbackReason =
  | "mock-mode"
  | "no-candidates"
  | "no-usable-records"
  | "scrape-failed";

export type FlightSearchOutcome =
  | { source: "live"; flights: FlightRecord[] }
  | { source: "fallback"; reason: FallbackReason; flights: FlightRecord[] };

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isCalendarDate = (value: string): boolean => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
};

export const flightSearchQuerySchema = z.object({
  origin: z.string().trim().min(1, "Origin is required"),
  destination: z.string().trim().min(1, "Destination is required"),
  journeyDate: z
    .string()
    .trim()
    .refine(isCalendarDate, "Journey date must use YYYY-MM-DD format (e.g. 2025-10-25)"),
});

export const createSearchQuery = (
  origin: string,
  destination: string,
  journeyDate: string,
): SearchQuery => Object.freeze({ origin, destination, journeyDate });

// Always UTC with a trailing "Z".
export const toSearchTimestamp = (date: Date): string => date.toISOString();
