import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors, { type CorsOptions } from "cors";

import { setupRoutes, type RouteDependencies } from "./routes";
import { createCorsOptions } from "./corsConfig";
import { log } from "./logger";

const DEFAULT_ORIGINS = [
  "http://localhost:3000",
  "http://127.0.0.1:3000",
  "http://localhost:5173",
  "http://127.0.0.1:5173",
  "http://localhost:8000",
  "http://127.0.0.1:8000",
];

type ParsedOrigin = {
  normalized: string;
};

const parseOriginValue = (origin: string): ParsedOrigin | null => {
  const trimmed = origin.trim();
  if (!trimmed) {
    return null;
  }

  try {
    const url = new URL(trimmed);
    const protocol = url.protocol.toLowerCase();
    if (protocol !== "http:" && protocol !== "https:") {
      return null;
    }

    const hostname = url.hostname.toLowerCase();
    const isHttps = protocol === "https:";
    const defaultPort = isHttps ? "443" : "80";
    const port = url.port && url.port !== defaultPort ? `:${url.port}` : "";

    return { normalized: `${protocol}//${hostname}${port}` };
  } catch {
    return { normalized: trimmed.toLowerCase() };
  }
};

export type CorsState = {
  isOriginAllowed: (origin?: string | null) => boolean;
  allowedOrigins: string[];
  corsOptions: CorsOptions;
};

const buildCorsState = (configuredOrigins: string[]): CorsState => {
  const allowedOrigins = configuredOrigins.length ? [...configuredOrigins] : [...DEFAULT_ORIGINS];

  const normalizedAllowedOrigins = new Set(
    allowedOrigins
      .map((origin) => parseOriginValue(origin)?.normalized)
      .filter((value): value is string => Boolean(value)),
  );

  // Same-origin and non-browser callers send no Origin header.
  const isOriginAllowed = (origin?: string | null): boolean => {
    if (!origin) {
      return true;
    }

    const parsed = parseOriginValue(origin);
    return parsed ? normalizedAllowedOrigins.has(parsed.normalized) : false;
  };

  return {
    isOriginAllowed,
    allowedOrigins,
    corsOptions: createCorsOptions(isOriginAllowed),
  };
};

const readErrorStatus = (err: unknown): number => {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") {
      return err.status;
    }
    if ("statusCode" in err && typeof err.statusCode === "number") {
      return err.statusCode;
    }
  }
  return 500;
};

export type CreateAppOptions = RouteDependencies & {
  corsOrigins?: string[];
};

export type CreateAppResult = CorsState & {
  app: Express;
};

export const createApp = ({ corsOrigins = [], ...routeDependencies }: CreateAppOptions): CreateAppResult => {
  const app = express();
  app.set("trust proxy", 1);

  const { corsOptions, isOriginAllowed, allowedOrigins } = buildCorsState(corsOrigins);

  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson?: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > 80) {
          logLine = `${logLine.slice(0, 79)}…`;
        }

        log(logLine);
      }
    });

    next();
  });

  setupRoutes(app, routeDependencies);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = readErrorStatus(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
    res.status(status).json({ message });
    log(`❌ Error: ${message}`);
  });

  return {
    app,
    corsOptions,
    isOriginAllowed,
    allowedOrigins,
  };
};

export const __testables__ = {
  parseOriginValue,
  buildCorsState,
  readErrorStatus,
};
