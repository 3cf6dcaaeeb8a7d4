import { describe, expect, it } from "@jest/globals";

import { listMockRoutes, lookupMockFlights } from "@shared/mockFlightCatalog";

const TIMESTAMP = "2025-10-20T08:00:00.000Z";

describe("lookupMockFlights", () => {
  it("returns the ten Bangalore to Delhi flights with injected search fields", () => {
    const flights = lookupMockFlights({ origin: "Bangalore", destination: "Delhi" }, TIMESTAMP);

    expect(flights).toHaveLength(10);
    expect(flights[0]).toEqual({
      airline: "IndiGo",
      flightNumber: "6E-123",
      departureTime: "06:30",
      arrivalTime: "09:10",
      price: "₹5,450",
      origin: "Bangalore",
      destination: "Delhi",
      searchTimestamp: TIMESTAMP,
    });
    expect(flights[9].flightNumber).toBe("6E-901");
    expect(new Set(flights.map((flight) => flight.searchTimestamp))).toEqual(new Set([TIMESTAMP]));
    expect(flights.every((flight) => flight.origin === "Bangalore" && flight.destination === "Delhi")).toBe(true);
  });

  it("returns an empty list for routes without mock data", () => {
    expect(lookupMockFlights({ origin: "Chennai", destination: "Mumbai" }, TIMESTAMP)).toEqual([]);
  });

  it("treats the route as directional", () => {
    expect(lookupMockFlights({ origin: "Delhi", destination: "Bangalore" }, TIMESTAMP)).toEqual([]);
  });

  it("hands out fresh records on every lookup", () => {
    const first = lookupMockFlights({ origin: "Bangalore", destination: "Delhi" }, TIMESTAMP);
    first[0].price = "₹1";

    const second = lookupMockFlights({ origin: "Bangalore", destination: "Delhi" }, TIMESTAMP);
    expect(second[0].price).toBe("₹5,450");
  });
});

describe("listMockRoutes", () => {
  it("lists the covered routes", () => {
    expect(listMockRoutes()).toEqual([{ origin: "Bangalore", destination: "Delhi" }]);
  });
});
