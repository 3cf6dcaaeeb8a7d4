import request from "supertest";
import type { Express } from "express";
import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";

import type { FlightRecord, FlightSearchOutcome, SearchQuery } from "@shared/flights";
import { createApp } from "../app";
import type { FlightSearchService } from "../flightSearchService";

const flight: FlightRecord = {
  airline: "IndiGo",
  flightNumber: "6E-123",
  departureTime: "06:30",
  arrivalTime: "09:10",
  price: "₹5,450",
  origin: "Bangalore",
  destination: "Delhi",
  searchTimestamp: "2025-10-20T08:00:00.000Z",
};

describe("flight search routes", () => {
  let app: Express;
  let search: jest.Mock<(query: SearchQuery) => Promise<FlightSearchOutcome>>;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);

    search = jest.fn<(query: SearchQuery) => Promise<FlightSearchOutcome>>();
    const flightSearch: FlightSearchService = { search };
    app = createApp({ flightSearch, corsOrigins: ["https://fares.example.test"] }).app;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns live flights as a JSON array", async () => {
    search.mockResolvedValue({ source: "live", flights: [flight] });

    const response = await request(app)
      .get("/api/flight-search")
      .query({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-10-25" })
      .expect(200);

    expect(response.body).toEqual([flight]);
    expect(response.headers["x-flight-source"]).toBe("live");
    expect(search).toHaveBeenCalledWith({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-10-25" });
  });

  it("accepts the journey_date spelling", async () => {
    search.mockResolvedValue({ source: "fallback", reason: "no-candidates", flights: [flight] });

    const response = await request(app)
      .get("/api/flight-search?origin=Bangalore&destination=Delhi&journey_date=2025-10-25")
      .expect(200);

    expect(response.headers["x-flight-source"]).toBe("fallback");
    expect(search).toHaveBeenCalledWith({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-10-25" });
  });

  it("rejects missing parameters without searching", async () => {
    const response = await request(app)
      .get("/api/flight-search")
      .query({ destination: "Delhi", journeyDate: "2025-10-25" })
      .expect(400);

    expect(response.body.message).toBe("Invalid flight search parameters");
    expect(response.body.errors[0].path).toEqual(["origin"]);
    expect(search).not.toHaveBeenCalled();
  });

  it("rejects impossible journey dates", async () => {
    const response = await request(app)
      .get("/api/flight-search")
      .query({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-13-01" })
      .expect(400);

    expect(response.body.errors[0].path).toEqual(["journeyDate"]);
    expect(search).not.toHaveBeenCalled();
  });

  it("maps an empty result to 404", async () => {
    search.mockResolvedValue({ source: "fallback", reason: "scrape-failed", flights: [] });

    const response = await request(app)
      .get("/api/flight-search")
      .query({ origin: "Chennai", destination: "Mumbai", journeyDate: "2025-10-25" })
      .expect(404);

    expect(response.body).toEqual({ message: "No flights found" });
    expect(response.headers["x-flight-source"]).toBe("fallback");
  });

  it("maps unexpected failures to a generic 500", async () => {
    search.mockRejectedValue(new Error("browser exploded"));

    const response = await request(app)
      .get("/api/flight-search")
      .query({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-10-25" })
      .expect(500);

    expect(response.body).toEqual({ message: "Flight search failed" });
  });

  it("searches from a JSON body", async () => {
    search.mockResolvedValue({ source: "live", flights: [flight] });

    await request(app)
      .post("/api/flight-search")
      .send({ origin: "Bangalore", destination: "Delhi", journey_date: "2025-10-25" })
      .expect(200);

    expect(search).toHaveBeenCalledWith({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-10-25" });
  });

  it("answers malformed JSON with 400", async () => {
    await request(app)
      .post("/api/flight-search")
      .set("Content-Type", "application/json")
      .send("{not json")
      .expect(400);

    expect(search).not.toHaveBeenCalled();
  });

  it("runs the canned test search", async () => {
    search.mockResolvedValue({ source: "live", flights: [flight] });

    await request(app).get("/api/test-flight-search").expect(200);

    expect(search).toHaveBeenCalledWith({ origin: "Bangalore", destination: "Delhi", journeyDate: "2025-10-25" });
  });

  it("reports service status and health", async () => {
    const root = await request(app).get("/").expect(200);
    expect(root.body).toEqual({
      status: "running",
      message: "Flight Search API is operational",
      version: "1.0.0",
    });

    const health = await request(app).get("/health").expect(200);
    expect(health.body.status).toBe("healthy");
    expect(health.body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(health.body.searches).toHaveProperty("flight_search_live");
  });

  it("answers unknown routes with 404", async () => {
    const response = await request(app).get("/api/nope").expect(404);
    expect(response.body).toEqual({ message: "Not found" });
  });

  it("mirrors allowed origins and exposes the source header", async () => {
    search.mockResolvedValue({ source: "live", flights: [flight] });

    const response = await request(app)
      .get("/api/test-flight-search")
      .set("Origin", "https://fares.example.test")
      .expect(200);

    expect(response.headers["access-control-allow-origin"]).toBe("https://fares.example.test");
    expect(response.headers["access-control-expose-headers"]).toBe("X-Flight-Source");
  });

  it("rejects origins that are not on the allow list", async () => {
    await request(app)
      .options("/api/flight-search")
      .set("Origin", "https://malicious.example.com")
      .set("Access-Control-Request-Method", "GET")
      .expect(500);
  });
});
