import { promises as fs } from "fs";
import path from "path";
import dotenv from "dotenv";
import { createMarketAnalystFromConfig } from "../src/market_analyst";
import { loadAgentConfig, resolveLogsDir } from "../src/utils/config";
import { describeError } from "../src/utils/errors";
import { CONNECTION_TEST_PROMPT } from "../src/utils/prompt_builder";
import { appendJsonLine } from "../src/utils/usage_log";

async function ensureWritableDirectory(targetDir: string): Promise<void> {
  await fs.mkdir(targetDir, { recursive: true });
  const probeFile = path.join(targetDir, ".write-test.tmp");
  await fs.writeFile(probeFile, "ok", "utf8");
  await fs.unlink(probeFile);
}

async function main(): Promise<void> {
  const agentRoot = path.resolve(__dirname, "..");
  const repoRoot = path.resolve(agentRoot, "..", "..");
  dotenv.config({ path: path.resolve(repoRoot, ".env"), quiet: true });

  const config = await loadAgentConfig(agentRoot);
  const logsDir = resolveLogsDir(agentRoot, config);
  await ensureWritableDirectory(logsDir);

  const analyst = await createMarketAnalystFromConfig(agentRoot, process.env.GEMINI_API_KEY, config);
  const connected = await analyst.testConnection();

  await appendJsonLine(path.join(logsDir, "verification.jsonl"), {
    ts: new Date().toISOString(),
    check: "environment_verification",
    model: analyst.model,
    prompt: CONNECTION_TEST_PROMPT,
    success: connected
  });

  if (!connected) {
    throw new Error(`${analyst.model} did not answer the connection test with OK.`);
  }

  console.log("✅ Environment Verified: Gemini connected and logs writable.");
}

main().catch((error: unknown) => {
  console.error(`Environment verification failed: ${describeError(error)}`);
  process.exit(1);
});
