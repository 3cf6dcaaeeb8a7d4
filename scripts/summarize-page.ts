import { promises as fs } from "fs";
import path from "path";

import { loadConfig } from "../server/config";
import { getErrorMessage } from "../server/logger";
import { createModelSummarizer, summarizePage } from "../server/pageSummaryService";

const DEFAULT_URL = "https://en.wikipedia.org/wiki/Artificial_intelligence";
const OUTPUT_FILE = "summary_output.txt";

async function run() {
  const url = process.argv[2] ?? DEFAULT_URL;
  const { summary: summaryConfig } = loadConfig();

  const result = await summarizePage(url, {
    maxChars: summaryConfig.maxChars,
    generate: createModelSummarizer(summaryConfig),
  });

  console.log(result.summary);

  const outputPath = path.resolve(process.cwd(), OUTPUT_FILE);
  await fs.writeFile(outputPath, `${result.summary}\n`, "utf8");
}

run().catch((error) => {
  console.error(`❌ ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
