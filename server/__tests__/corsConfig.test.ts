import { describe, expect, it } from "@jest/globals";

import { __testables__ } from "../app";
import { CORS_ALLOWED_HEADERS, createCorsOptions } from "../corsConfig";

const toLowerSet = (values: readonly string[]) =>
  new Set(values.map((value) => value.toLowerCase()));

describe("CORS configuration", () => {
  it("only exposes the base allow-list headers", () => {
    const expectedHeaders = ["content-type", "authorization", "x-request-id"];

    expect(toLowerSet(CORS_ALLOWED_HEADERS)).toEqual(new Set(expectedHeaders));

    const options = createCorsOptions(() => true);
    const allowedHeaders = Array.isArray(options.allowedHeaders)
      ? options.allowedHeaders
      : typeof options.allowedHeaders === "string"
        ? options.allowedHeaders.split(",")
        : [];

    expect(toLowerSet(allowedHeaders)).toEqual(new Set(expectedHeaders));
  });
});

describe("origin allow-list", () => {
  const { buildCorsState, parseOriginValue } = __testables__;

  it("normalizes default ports and case", () => {
    expect(parseOriginValue("HTTPS://Fares.Example.test:443")).toEqual({
      normalized: "https://fares.example.test",
    });
    expect(parseOriginValue("ftp://fares.example.test")).toBeNull();
  });

  it("uses local development origins when none are configured", () => {
    const state = buildCorsState([]);

    expect(state.isOriginAllowed("http://localhost:5173")).toBe(true);
    expect(state.isOriginAllowed("https://fares.example.test")).toBe(false);
    expect(state.isOriginAllowed(undefined)).toBe(true);
  });

  it("replaces the defaults with configured origins", () => {
    const state = buildCorsState(["https://fares.example.test/"]);

    expect(state.allowedOrigins).toEqual(["https://fares.example.test/"]);
    expect(state.isOriginAllowed("https://fares.example.test")).toBe(true);
    expect(state.isOriginAllowed("http://localhost:5173")).toBe(false);
  });
});
