import axios from "axios";
import { load } from "cheerio";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { generateText } from "ai";

import { log } from "./logger";

export interface SummaryModelConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
}

export interface SummarizePageOptions {
  maxChars?: number;
  fetchHtml?: (url: string) => Promise<string>;
  generate: (prompt: string) => Promise<string>;
}

export interface PageSummary {
  url: string;
  cleanedText: string;
  summary: string;
}

export const DEFAULT_MAX_CHARS = 5_000;

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

const NOISE_SELECTORS = [
  "script",
  "style",
  "nav",
  "header",
  "footer",
  "aside",
  "noscript",
  "meta",
  "link",
  "div#footer",
];

// Everything after one of these markers is site chrome.
const TRAILING_NOISE_PATTERNS = [/Wikipedia.*/i, /Jump to.*/i];

export const normalizeUrl = (rawUrl: string): string => {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    throw new Error("URL is required");
  }

  const hasProtocol = /^https?:\/\//i.test(trimmed);
  const candidate = hasProtocol ? trimmed : `https://${trimmed}`;

  const parsed = new URL(candidate);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("Only HTTP and HTTPS URLs are supported");
  }

  return parsed.toString();
};

export async function fetchPageHtml(url: string): Promise<string> {
  const response = await axios.get<string>(url, {
    headers: { "User-Agent": BROWSER_USER_AGENT },
    responseType: "text",
    timeout: 15_000,
  });
  return response.data;
}

export function cleanPageText(html: string, maxChars: number = DEFAULT_MAX_CHARS): string {
  const $ = load(html);
  $(NOISE_SELECTORS.join(", ")).remove();

  // The parser always synthesizes a <body>, so there is always a root.
  const content = $("div#mw-content-text").first();
  const root = content.length > 0 ? content : $("body").first();

  // Pad every element so adjacent blocks do not run together.
  root.find("*").prepend(" ").append(" ");

  const text = TRAILING_NOISE_PATTERNS.reduce(
    (current, pattern) => current.replace(pattern, ""),
    root.text().replace(/\s+/g, " ").trim(),
  );

  return text.trim().slice(0, maxChars);
}

export function buildSummaryPrompt(text: string): string {
  return [
    "Analyze the following webpage content and summarize it into 3-5 concise bullet points focusing on key aspects, trends, and implications. Then, provide one short insight that interprets the overall theme or trend in a single line.",
    "",
    "Content:",
    text,
    "",
    "Output format:",
    "Summary:",
    "• <point 1>",
    "• <point 2>",
    "• <point 3>",
    "• <point 4>",
    "• <point 5>",
    "",
    "Insight:",
    "<single-line insight>",
  ].join("\n");
}

export function createModelSummarizer(config: SummaryModelConfig): (prompt: string) => Promise<string> {
  if (!config.apiKey) {
    throw new Error("SUMMARY_API_KEY is not set");
  }

  const provider = createOpenAICompatible({
    name: "summary",
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
  });
  const model = provider(config.model);

  return async (prompt) => {
    const { text } = await generateText({ model, prompt });
    return text;
  };
}

export async function summarizePage(
  rawUrl: string,
  options: SummarizePageOptions,
): Promise<PageSummary> {
  const url = normalizeUrl(rawUrl);
  const fetchHtml = options.fetchHtml ?? fetchPageHtml;

  log(`📄 Fetching ${url}`, "summary");
  const html = await fetchHtml(url);
  const cleanedText = cleanPageText(html, options.maxChars ?? DEFAULT_MAX_CHARS);
  if (!cleanedText) {
    throw new Error(`No readable text found at ${url}`);
  }

  log(`🧠 Summarizing ${cleanedText.length} characters`, "summary");
  const summary = await options.generate(buildSummaryPrompt(cleanedText));

  return { url, cleanedText, summary: summary.trim() };
}
