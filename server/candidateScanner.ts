import type { PageElement, SearchPage } from "./searchPage";

export interface CandidateStrategy {
  name: string;
  selector: string;
}

export interface CandidateScan {
  strategy: CandidateStrategy | null;
  elements: PageElement[];
}

export const MAX_CANDIDATES = 15;

// Priority order; the first strategy that matches anything wins.
export const CANDIDATE_STRATEGIES: readonly CandidateStrategy[] = [
  { name: "flight-class", selector: "div[class*='flight']" },
  { name: "result-class", selector: "div[class*='result']" },
  { name: "flight-card", selector: ".flight-card" },
  { name: "result-item", selector: ".result-item" },
  { name: "flight-test-id", selector: "[data-testid*='flight']" },
];

export async function scanForCandidates(
  page: SearchPage,
  strategies: readonly CandidateStrategy[] = CANDIDATE_STRATEGIES,
  limit: number = MAX_CANDIDATES,
): Promise<CandidateScan> {
  for (const strategy of strategies) {
    const elements = await page.queryAll(strategy.selector);
    if (elements.length > 0) {
      return { strategy, elements: elements.slice(0, limit) };
    }
  }

  return { strategy: null, elements: [] };
}
