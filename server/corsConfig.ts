import type { CorsOptions } from "cors";

export const FLIGHT_SOURCE_HEADER = "X-Flight-Source";

export const CORS_ALLOWED_HEADERS = ["Content-Type", "Authorization", "X-Request-ID"];

export const createCorsOptions = (
  isOriginAllowed: (origin?: string | null) => boolean,
): CorsOptions => ({
  origin(origin, callback) {
    if (isOriginAllowed(origin)) {
      return callback(null, true);
    }

    const error = new Error(
      origin ? `Not allowed by CORS: ${origin}` : "Not allowed by CORS",
    );
    return callback(error);
  },
  allowedHeaders: CORS_ALLOWED_HEADERS,
  exposedHeaders: [FLIGHT_SOURCE_HEADER],
  methods: ["GET", "POST", "OPTIONS"],
  optionsSuccessStatus: 204,
});
