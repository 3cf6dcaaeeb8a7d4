import type { Express, Response } from "express";

import { createSearchQuery, flightSearchQuerySchema } from "@shared/flights";
import { FLIGHT_SOURCE_HEADER } from "./corsConfig";
import type { FlightSearchService } from "./flightSearchService";
import { getSearchCounters } from "./observability";

export const SERVICE_VERSION = "1.0.0";

export interface RouteDependencies {
  flightSearch: FlightSearchService;
}

const SAMPLE_SEARCH = {
  origin: "Bangalore",
  destination: "Delhi",
  journeyDate: "2025-10-25",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Older clients send journey_date.
const readSearchInput = (source: unknown) => {
  const input = isRecord(source) ? source : {};
  return {
    origin: input.origin,
    destination: input.destination,
    journeyDate: input.journeyDate ?? input.journey_date,
  };
};

export function setupRoutes(app: Express, { flightSearch }: RouteDependencies): void {
  const handleFlightSearch = async (input: unknown, res: Response) => {
    const validationResult = flightSearchQuerySchema.safeParse(input);
    if (!validationResult.success) {
      return res.status(400).json({
        message: "Invalid flight search parameters",
        errors: validationResult.error.issues,
      });
    }

    const { origin, destination, journeyDate } = validationResult.data;

    try {
      const outcome = await flightSearch.search(createSearchQuery(origin, destination, journeyDate));
      res.setHeader(FLIGHT_SOURCE_HEADER, outcome.source);

      if (outcome.flights.length === 0) {
        return res.status(404).json({ message: "No flights found" });
      }

      return res.json(outcome.flights);
    } catch (error: unknown) {
      console.error("Error during flight search:", error);
      return res.status(500).json({ message: "Flight search failed" });
    }
  };

  app.get("/", (_req, res) => {
    res.json({
      status: "running",
      message: "Flight Search API is operational",
      version: SERVICE_VERSION,
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      searches: getSearchCounters(),
    });
  });

  app.get("/api/flight-search", async (req, res) => {
    await handleFlightSearch(readSearchInput(req.query), res);
  });

  app.post("/api/flight-search", async (req, res) => {
    await handleFlightSearch(readSearchInput(req.body), res);
  });

  app.get("/api/test-flight-search", async (_req, res) => {
    await handleFlightSearch(SAMPLE_SEARCH, res);
  });
}
