import type { FlightRecord, FlightTemplate, SearchQuery } from "./flights";

export interface MockRoute {
  origin: string;
  destination: string;
  flights: readonly FlightTemplate[];
}

// Journey date is deliberately not part of the key.
const mockRoutes: readonly MockRoute[] = [
  {
    origin: "Bangalore",
    destination: "Delhi",
    flights: [
      { airline: "IndiGo", flightNumber: "6E-123", departureTime: "06:30", arrivalTime: "09:10", price: "₹5,450" },
      { airline: "Air India", flightNumber: "AI-504", departureTime: "07:15", arrivalTime: "09:55", price: "₹6,120" },
      { airline: "SpiceJet", flightNumber: "SG-8256", departureTime: "08:45", arrivalTime: "11:25", price: "₹4,890" },
      { airline: "GoAir", flightNumber: "G8-456", departureTime: "09:20", arrivalTime: "12:00", price: "₹5,100" },
      { airline: "Vistara", flightNumber: "UK-834", departureTime: "10:00", arrivalTime: "12:40", price: "₹7,200" },
      { airline: "AirAsia", flightNumber: "I5-234", departureTime: "12:15", arrivalTime: "14:55", price: "₹3,450" },
      { airline: "IndiGo", flightNumber: "6E-567", departureTime: "14:30", arrivalTime: "17:10", price: "₹5,890" },
      { airline: "Air India", flightNumber: "AI-608", departureTime: "16:00", arrivalTime: "18:40", price: "₹6,450" },
      { airline: "SpiceJet", flightNumber: "SG-8890", departureTime: "17:45", arrivalTime: "20:25", price: "₹5,200" },
      { airline: "IndiGo", flightNumber: "6E-901", departureTime: "19:15", arrivalTime: "21:55", price: "₹6,100" },
    ],
  },
];

const routeKey = (origin: string, destination: string) => `${origin}\u0000${destination}`;

const catalog = new Map(
  mockRoutes.map((route): [string, readonly FlightTemplate[]] => [
    routeKey(route.origin, route.destination),
    route.flights,
  ]),
);

export function listMockRoutes(): Array<{ origin: string; destination: string }> {
  return mockRoutes.map(({ origin, destination }) => ({ origin, destination }));
}

export function lookupMockFlights(
  query: Pick<SearchQuery, "origin" | "destination">,
  searchTimestamp: string,
): FlightRecord[] {
  const templates = catalog.get(routeKey(query.origin, query.destination)) ?? [];

  return templates.map((template) => ({
    ...template,
    origin: query.origin,
    destination: query.destination,
    searchTimestamp,
  }));
}
