import { promises as fs } from "fs";
import path from "path";

export type UsageRecord = {
  ts: string;
  script: string;
  model: string;
  input_tokens: number;
  output_tokens: number;
  success: boolean;
  error?: string;
};

export async function appendJsonLine(filePath: string, record: object): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

/** Usage logging is best effort: a failed write is reported and inference carries on. */
export async function recordUsage(logsDir: string | undefined, record: UsageRecord): Promise<void> {
  if (!logsDir) return;
  try {
    await appendJsonLine(path.join(logsDir, "llm_usage.jsonl"), record);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Usage log write failed: ${message}`);
  }
}
