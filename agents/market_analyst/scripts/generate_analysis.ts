import dotenv from "dotenv";
import { promises as fs } from "fs";
import path from "path";
import pLimit from "p-limit";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { AnalysisRequestSchema, type AnalysisRequest } from "../src/schemas/analysis_request.schema";
import type { AnalysisOutcome } from "../src/schemas/analysis_result.schema";
import { createMarketAnalystFromConfig } from "../src/market_analyst";
import { describeError } from "../src/utils/errors";
import { toMarkdownReport } from "../src/utils/report";

type Args = {
  inputPath: string;
  searchPath: string | null;
  attachmentsPath: string | null;
  concurrency: number;
};

const RequestFileSchema = z.union([AnalysisRequestSchema, z.array(AnalysisRequestSchema).min(1)]);

function toDateStamp(date = new Date()): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}${mm}${dd}`;
}

function parseArgs(argv: string[]): Args {
  let inputPath = "";
  let searchPath: string | null = null;
  let attachmentsPath: string | null = null;
  let concurrency = 2;

  for (const arg of argv) {
    if (arg.startsWith("--search=")) {
      searchPath = arg.slice("--search=".length) || null;
      continue;
    }
    if (arg.startsWith("--attachments=")) {
      attachmentsPath = arg.slice("--attachments=".length) || null;
      continue;
    }
    if (arg.startsWith("--concurrency=")) {
      const n = Number(arg.split("=")[1]);
      concurrency = Number.isFinite(n) && n > 0 ? Math.floor(n) : 2;
      continue;
    }
    if (!arg.startsWith("--") && !inputPath) {
      inputPath = arg;
    }
  }

  return { inputPath, searchPath, attachmentsPath, concurrency };
}

function resolveFromAgent(agentRoot: string, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(agentRoot, filePath);
}

async function readRequests(filePath: string): Promise<AnalysisRequest[]> {
  const raw = await fs.readFile(filePath, "utf8");

  if (filePath.toLowerCase().endsWith(".csv")) {
    const rows: unknown[] = parse(raw, {
      columns: true,
      skip_empty_lines: true,
      trim: true
    });
    return rows.map((row, index) => {
      const parsed = AnalysisRequestSchema.safeParse(row);
      if (!parsed.success) {
        throw new Error(`Invalid request at CSV row ${index + 1}: ${parsed.error.message}`);
      }
      return parsed.data;
    });
  }

  const parsed = RequestFileSchema.parse(JSON.parse(raw));
  return Array.isArray(parsed) ? parsed : [parsed];
}

async function readContext(agentRoot: string, filePath: string | null): Promise<string | undefined> {
  if (!filePath) return undefined;
  return fs.readFile(resolveFromAgent(agentRoot, filePath), "utf8");
}

async function main(): Promise<void> {
  const agentRoot = path.resolve(__dirname, "..");
  const repoRoot = path.resolve(agentRoot, "..", "..");
  dotenv.config({ path: path.resolve(repoRoot, ".env"), quiet: true });

  const args = parseArgs(process.argv.slice(2));
  const inputPath = resolveFromAgent(agentRoot, args.inputPath || path.join("data", "sample_request.json"));
  const requests = await readRequests(inputPath);
  const searchContext = await readContext(agentRoot, args.searchPath);
  const attachmentsContext = await readContext(agentRoot, args.attachmentsPath);

  const analyst = await createMarketAnalystFromConfig(agentRoot, process.env.GEMINI_API_KEY);

  const limit = pLimit(args.concurrency);
  const outcomes: AnalysisOutcome[] = await Promise.all(
    requests.map((request) => limit(() => analyst.generate(request, searchContext, attachmentsContext)))
  );

  const reportsDir = path.join(agentRoot, "reports");
  await fs.mkdir(reportsDir, { recursive: true });
  const dateStamp = toDateStamp();
  const historyDir = path.join(agentRoot, "history");
  const sessionLogPath = path.join(historyDir, "session_log.md");
  await fs.mkdir(historyDir, { recursive: true });

  const outputs: string[] = [];
  for (const [index, outcome] of outcomes.entries()) {
    const suffix = outcomes.length > 1 ? `_${index + 1}` : "";
    const baseName = `market_analysis_${dateStamp}${suffix}`;
    const jsonOutput = path.join(reportsDir, `${baseName}.json`);
    const mdOutput = path.join(reportsDir, `${baseName}.md`);

    const payload = {
      quality: outcome.quality,
      reason: outcome.quality === "full" ? null : outcome.reason,
      request: requests[index],
      analysis: outcome.analysis
    };
    await fs.writeFile(jsonOutput, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.writeFile(mdOutput, toMarkdownReport(outcome, dateStamp), "utf8");

    const segment = requests[index].segmento?.trim() || "unspecified segment";
    const historyLine = `[${new Date().toISOString().slice(0, 10)}] Generated ${outcome.quality} analysis for ${segment} - ${jsonOutput}`;
    await fs.appendFile(sessionLogPath, `${historyLine}\n`, "utf8");
    outputs.push(jsonOutput);

    if (outcome.quality !== "full") {
      console.warn(`Analysis ${index + 1} degraded to ${outcome.quality}: ${outcome.reason}`);
    }
  }

  console.log("Market analysis complete.");
  console.log(`- Input: ${inputPath}`);
  console.log(`- Model: ${analyst.model}`);
  console.log(`- Requests processed: ${requests.length}`);
  console.log(`- Full analyses: ${outcomes.filter((outcome) => outcome.quality === "full").length}`);
  outputs.forEach((output) => console.log(`- Output: ${output}`));
  console.log(`- Session log: ${sessionLogPath}`);
}

main().catch((error: unknown) => {
  console.error(`Market analysis failed: ${describeError(error)}`);
  process.exit(1);
});
