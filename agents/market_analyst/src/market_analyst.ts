import type { AnalysisRequest } from "./schemas/analysis_request.schema";
import type { AnalysisOutcome, AnalysisResult } from "./schemas/analysis_result.schema";
import {
  DEFAULT_GENERATION,
  DEFAULT_MODEL,
  DEFAULT_SAFETY,
  loadAgentConfig,
  resolveGenerationModel,
  resolveLogsDir,
  type AgentConfig,
  type GenerationSettings,
  type SafetySetting
} from "./utils/config";
import { ConfigurationError, describeError } from "./utils/errors";
import { buildEmergencyFallback, loadFallbackTemplates, type FallbackTemplates } from "./utils/fallbacks";
import { createGeminiTransport, type GenerateContent } from "./utils/gemini_client";
import { buildAnalysisPrompt, CONNECTION_TEST_PROMPT, loadPromptTemplate } from "./utils/prompt_builder";
import { parseAnalysisResponse } from "./utils/response_parser";

export type AnalystAssets = {
  promptTemplate: string;
  fallbacks: FallbackTemplates;
};

export type MarketAnalystOptions = {
  apiKey: string | undefined;
  assets: AnalystAssets;
  model?: string;
  generation?: GenerationSettings;
  safety?: readonly SafetySetting[];
  logsDir?: string;
  /** Replaces the Gemini HTTP call; the API key is still required. */
  transport?: GenerateContent;
  now?: () => Date;
};

export async function loadAnalystAssets(agentRoot: string): Promise<AnalystAssets> {
  const [promptTemplate, fallbacks] = await Promise.all([
    loadPromptTemplate(agentRoot),
    loadFallbackTemplates(agentRoot)
  ]);
  return { promptTemplate, fallbacks };
}

export class MarketAnalyst {
  readonly model: string;
  readonly generation: Readonly<GenerationSettings>;
  readonly safety: readonly SafetySetting[];

  private readonly assets: AnalystAssets;
  private readonly transport: GenerateContent;
  private readonly now: () => Date;

  constructor(options: MarketAnalystOptions) {
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new ConfigurationError("GEMINI_API_KEY is not set.");
    }

    this.model = options.model ?? DEFAULT_MODEL;
    this.generation = Object.freeze({ ...(options.generation ?? DEFAULT_GENERATION) });
    this.safety = Object.freeze([...(options.safety ?? DEFAULT_SAFETY)]);
    this.assets = options.assets;
    this.transport = options.transport ?? createGeminiTransport({ apiKey, logsDir: options.logsDir });
    this.now = options.now ?? (() => new Date());
  }

  private send(prompt: string): Promise<string> {
    return this.transport({
      model: this.model,
      prompt,
      generation: this.generation,
      safety: this.safety
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      const reply = await this.send(CONNECTION_TEST_PROMPT);
      return reply.includes("OK");
    } catch (error: unknown) {
      console.error(`Gemini connection test failed: ${describeError(error)}`);
      return false;
    }
  }

  emergencyFallback(params: AnalysisRequest): AnalysisResult {
    return buildEmergencyFallback(this.assets.fallbacks, params, this.now());
  }

  /** Never rejects: transport failures and empty replies come back as the emergency record. */
  async generate(
    params: AnalysisRequest,
    searchContext?: string,
    attachmentsContext?: string
  ): Promise<AnalysisOutcome> {
    const prompt = buildAnalysisPrompt(this.assets.promptTemplate, params, searchContext, attachmentsContext);

    console.log(`Starting detailed analysis with ${this.model}...`);
    const startedAt = Date.now();

    let text: string;
    try {
      text = await this.send(prompt);
    } catch (error: unknown) {
      const reason = describeError(error);
      console.error(`Gemini analysis failed: ${reason}`);
      return { quality: "fallback", analysis: this.emergencyFallback(params), reason };
    }

    if (!text.trim()) {
      const reason = "Empty response from Gemini.";
      console.error(`Gemini analysis failed: ${reason}`);
      return { quality: "fallback", analysis: this.emergencyFallback(params), reason };
    }

    const seconds = ((Date.now() - startedAt) / 1000).toFixed(2);
    console.log(`Detailed analysis finished in ${seconds}s.`);
    return parseAnalysisResponse(text, {
      model: this.model,
      request: params,
      fallbacks: this.assets.fallbacks,
      now: this.now
    });
  }
}

/**
 * Builds the client or returns null when it cannot be configured, so callers
 * can run with the analysis feature disabled.
 */
export function tryCreateMarketAnalyst(options: MarketAnalystOptions): MarketAnalyst | null {
  try {
    return new MarketAnalyst(options);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      console.error(`Market analyst disabled: ${error.message}`);
      return null;
    }
    throw error;
  }
}

export async function createMarketAnalystFromConfig(
  agentRoot: string,
  apiKey: string | undefined,
  config?: AgentConfig
): Promise<MarketAnalyst> {
  const resolved = config ?? (await loadAgentConfig(agentRoot));
  const assets = await loadAnalystAssets(agentRoot);
  return new MarketAnalyst({
    apiKey,
    assets,
    model: resolveGenerationModel(resolved),
    generation: resolved.generation,
    safety: resolved.safety,
    logsDir: resolveLogsDir(agentRoot, resolved)
  });
}
