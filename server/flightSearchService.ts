import {
  toSearchTimestamp,
  type FallbackReason,
  type FlightRecord,
  type FlightSearchOutcome,
  type SearchQuery,
} from "@shared/flights";
import { buildFlightRecord, isUsableFlightRecord } from "@shared/flightExtractors";
import { listMockRoutes, lookupMockFlights } from "@shared/mockFlightCatalog";
import {
  CANDIDATE_STRATEGIES,
  scanForCandidates,
  type CandidateStrategy,
} from "./candidateScanner";
import type { SearchTimings } from "./config";
import { FlightScrapeError } from "./errors";
import { log } from "./logger";
import { logScrapeFailure, trackFlightSearchOutcome, type ScrapeStep } from "./observability";
import type { OpenSearchPage, PageElement, SearchPage } from "./searchPage";

export interface FlightSearchOptions {
  openPage: OpenSearchPage;
  targetUrl: string;
  timings: SearchTimings;
  useMock?: boolean;
  strategies?: readonly CandidateStrategy[];
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface FlightSearchService {
  search(query: SearchQuery): Promise<FlightSearchOutcome>;
}

type LiveScrapeResult = {
  flights: FlightRecord[];
  reason?: Extract<FallbackReason, "no-candidates" | "no-usable-records">;
};

const LOG_SOURCE = "flight-search";

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const runStep = async <T>(step: ScrapeStep, action: () => Promise<T>): Promise<T> => {
  try {
    return await action();
  } catch (error) {
    throw error instanceof FlightScrapeError ? error : new FlightScrapeError(step, error);
  }
};

/**
 * Fills origin, destination and journey date, then presses the first button
 * labelled "search". Missing inputs are skipped rather than treated as errors;
 * the result scan decides whether anything usable came back.
 */
export async function submitSearchForm(
  page: SearchPage,
  query: SearchQuery,
  timings: Pick<SearchTimings, "fieldPauseMs" | "resultsSettleMs">,
  sleep: (ms: number) => Promise<void> = delay,
): Promise<boolean> {
  const [originInput, destinationInput] = await page.queryAll('input[type="text"]');
  if (originInput) {
    await originInput.fill(query.origin);
    await sleep(timings.fieldPauseMs);
  }
  if (destinationInput) {
    await destinationInput.fill(query.destination);
    await sleep(timings.fieldPauseMs);
  }

  const [dateInput] = await page.queryAll('input[type="date"]');
  if (dateInput) {
    await dateInput.fill(query.journeyDate);
  }

  let submitted = false;
  for (const button of await page.queryAll("button")) {
    const label = await button.innerText();
    if (label.toLowerCase().includes("search")) {
      await button.click();
      submitted = true;
      break;
    }
  }

  if (!submitted) {
    log("⚠️ No search button found, scanning the page as loaded", LOG_SOURCE);
  }

  await sleep(timings.resultsSettleMs);
  return submitted;
}

// Candidates are read one at a time, in scan order.
export async function readCandidateTexts(elements: readonly PageElement[]): Promise<string[]> {
  const texts: string[] = [];
  for (const element of elements) {
    texts.push(await element.innerText());
  }
  return texts;
}

export function extractFlightRecords(
  texts: readonly string[],
  query: SearchQuery,
  searchTimestamp: string,
): FlightRecord[] {
  return texts
    .map((text) => buildFlightRecord(text, query, searchTimestamp))
    .filter(isUsableFlightRecord);
}

async function scrapeLiveFlights(
  query: SearchQuery,
  options: FlightSearchOptions,
): Promise<LiveScrapeResult> {
  const sleep = options.sleep ?? delay;
  const now = options.now ?? (() => new Date());
  const { timings } = options;

  const page = await runStep("launch", () => options.openPage());

  try {
    await runStep("navigate", async () => {
      log(`🌐 Opening ${options.targetUrl}`, LOG_SOURCE);
      await page.goto(options.targetUrl, timings.pageLoadTimeoutMs);
      await sleep(timings.pageSettleMs);
    });

    await runStep("fill-form", () => submitSearchForm(page, query, timings, sleep));

    const scan = await runStep("scan", () =>
      scanForCandidates(page, options.strategies ?? CANDIDATE_STRATEGIES),
    );
    if (!scan.strategy) {
      log("No candidate elements matched any selector", LOG_SOURCE);
      return { flights: [], reason: "no-candidates" };
    }

    log(`Found ${scan.elements.length} candidates with ${scan.strategy.name} (${scan.strategy.selector})`, LOG_SOURCE);

    const searchTimestamp = toSearchTimestamp(now());
    const texts = await runStep("extract", () => readCandidateTexts(scan.elements));
    const flights = extractFlightRecords(texts, query, searchTimestamp);

    if (flights.length === 0) {
      log("No flights extracted from DOM", LOG_SOURCE);
      return { flights: [], reason: "no-usable-records" };
    }

    log(`✅ Extracted ${flights.length} of ${texts.length} candidates`, LOG_SOURCE);
    return { flights };
  } finally {
    try {
      await page.close();
    } catch (closeError) {
      console.error("Error closing search page:", closeError);
    }
  }
}

export const describeMockRoutes = (): string =>
  listMockRoutes()
    .map(({ origin, destination }) => `${origin} → ${destination}`)
    .join(", ");

function fallbackOutcome(
  query: SearchQuery,
  reason: FallbackReason,
  now: () => Date,
): FlightSearchOutcome {
  const flights = lookupMockFlights(query, toSearchTimestamp(now()));
  log(`[FALLBACK] Using mock data (${reason}): ${flights.length} flights`, LOG_SOURCE);
  if (flights.length === 0) {
    log(`No mock flights for ${query.origin} → ${query.destination} (covered: ${describeMockRoutes()})`, LOG_SOURCE);
  }
  return { source: "fallback", reason, flights };
}

/**
 * Runs one search and always answers: engine failures and empty pages fall
 * back to the mock catalog, which may itself be empty for unknown routes.
 */
export async function searchFlights(
  query: SearchQuery,
  options: FlightSearchOptions,
): Promise<FlightSearchOutcome> {
  const now = options.now ?? (() => new Date());
  let outcome: FlightSearchOutcome;

  if (options.useMock) {
    outcome = fallbackOutcome(query, "mock-mode", now);
  } else {
    log(`🔍 Searching ${query.origin} → ${query.destination} on ${query.journeyDate}`, LOG_SOURCE);
    try {
      const live = await scrapeLiveFlights(query, options);
      outcome = live.reason
        ? fallbackOutcome(query, live.reason, now)
        : { source: "live", flights: live.flights };
    } catch (error) {
      logScrapeFailure({
        step: error instanceof FlightScrapeError ? error.step : "launch",
        query,
        error,
      });
      outcome = fallbackOutcome(query, "scrape-failed", now);
    }
  }

  trackFlightSearchOutcome(outcome);
  return outcome;
}

export const createFlightSearchService = (options: FlightSearchOptions): FlightSearchService => ({
  search: (query) => searchFlights(query, options),
});
