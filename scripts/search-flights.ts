import { promises as fs } from "fs";
import path from "path";

import { createSearchQuery, flightSearchQuerySchema } from "@shared/flights";
import { loadConfig } from "../server/config";
import { describeMockRoutes, searchFlights } from "../server/flightSearchService";
import { getErrorMessage } from "../server/logger";
import { createPuppeteerPageOpener } from "../server/puppeteerSearchPage";

const OUTPUT_FILE = "flight_results.json";
const RULE = "=".repeat(60);

async function run() {
  const [origin = "Bangalore", destination = "Delhi", journeyDate = "2025-10-25"] =
    process.argv.slice(2);

  const parsed = flightSearchQuerySchema.safeParse({ origin, destination, journeyDate });
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`✗ ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }

  const query = createSearchQuery(parsed.data.origin, parsed.data.destination, parsed.data.journeyDate);
  const config = loadConfig();

  console.log(RULE);
  console.log("FLIGHT SEARCH");
  console.log(RULE);
  console.log(`Origin: ${query.origin}`);
  console.log(`Destination: ${query.destination}`);
  console.log(`Journey Date: ${query.journeyDate}`);
  console.log(RULE);

  const outcome = await searchFlights(query, {
    openPage: createPuppeteerPageOpener(config.browser),
    targetUrl: config.flightSearch.targetUrl,
    timings: config.flightSearch.timings,
    useMock: config.flightSearch.useMock,
  });

  const outputPath = path.resolve(process.cwd(), OUTPUT_FILE);
  await fs.writeFile(outputPath, `${JSON.stringify(outcome.flights, null, 2)}\n`, "utf8");

  console.log(`\n${RULE}`);
  console.log(`RESULTS SAVED: ${outputPath}`);
  console.log(`Total Flights Extracted: ${outcome.flights.length}`);
  console.log(
    outcome.source === "live"
      ? "Status: ✓ Real data from website"
      : `Status: ⚠ Using mock/fallback data (${outcome.reason})`,
  );
  console.log(RULE);

  const [first] = outcome.flights;
  if (first) {
    console.log("\nSample Flight Data:");
    console.log(JSON.stringify(first, null, 2));
  } else if (outcome.source === "fallback") {
    console.log(`\nMock data covers: ${describeMockRoutes()}`);
  }
}

run().catch((error) => {
  console.error(`❌ ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
