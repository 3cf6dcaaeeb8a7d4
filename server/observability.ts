import type { FlightSearchOutcome, SearchQuery } from "@shared/flights";
import { getErrorMessage, log } from "./logger";

export type ScrapeStep = "launch" | "navigate" | "fill-form" | "scan" | "extract";

type ScrapeFailureContext = {
  step: ScrapeStep;
  query: SearchQuery;
  error: unknown;
};

const searchCounters: Record<string, number> = {
  flight_search_live: 0,
  flight_search_fallback_mock_mode: 0,
  flight_search_fallback_no_candidates: 0,
  flight_search_fallback_no_usable_records: 0,
  flight_search_fallback_scrape_failed: 0,
};

const getOutcomeMetricKey = (outcome: FlightSearchOutcome) =>
  outcome.source === "live"
    ? "flight_search_live"
    : `flight_search_fallback_${outcome.reason.replace(/-/g, "_")}`;

export const trackFlightSearchOutcome = (outcome: FlightSearchOutcome) => {
  const key = getOutcomeMetricKey(outcome);
  searchCounters[key] = (searchCounters[key] ?? 0) + 1;

  log(`📈 metrics.${key}=${searchCounters[key]} flights=${outcome.flights.length}`, "metrics");
};

export const getSearchCounters = (): Readonly<Record<string, number>> => ({ ...searchCounters });

export const logScrapeFailure = ({ step, query, error }: ScrapeFailureContext) => {
  const timestamp = new Date().toISOString();

  log(
    `flight-search ${step} failure :: ts=${timestamp} route=${query.origin}→${query.destination} date=${query.journeyDate} :: ${getErrorMessage(error)}`,
    "flight-search",
  );
};
