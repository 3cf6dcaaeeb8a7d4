import type { ScrapeStep } from "./observability";

export class FlightScrapeError extends Error {
  readonly step: ScrapeStep;

  constructor(step: ScrapeStep, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Flight scrape failed during ${step}: ${reason}`, { cause });
    this.name = "FlightScrapeError";
    this.step = step;
  }
}
