import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { z } from "zod";

export const DEFAULT_MODEL = "gemini-1.5-flash";

const HarmCategorySchema = z.enum([
  "HARM_CATEGORY_HARASSMENT",
  "HARM_CATEGORY_HATE_SPEECH",
  "HARM_CATEGORY_SEXUALLY_EXPLICIT",
  "HARM_CATEGORY_DANGEROUS_CONTENT"
]);

const BlockThresholdSchema = z.enum([
  "BLOCK_NONE",
  "BLOCK_ONLY_HIGH",
  "BLOCK_MEDIUM_AND_ABOVE",
  "BLOCK_LOW_AND_ABOVE"
]);

const SafetySettingSchema = z.object({
  category: HarmCategorySchema,
  threshold: BlockThresholdSchema
});

export type SafetySetting = z.infer<typeof SafetySettingSchema>;

const GenerationSettingsSchema = z.object({
  temperature: z.number().min(0).max(2).default(0.8),
  top_p: z.number().min(0).max(1).default(0.9),
  top_k: z.number().int().positive().default(40),
  max_output_tokens: z.number().int().positive().default(32768)
});

export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>;

export const DEFAULT_SAFETY: readonly SafetySetting[] = [
  { category: "HARM_CATEGORY_HARASSMENT", threshold: "BLOCK_MEDIUM_AND_ABOVE" },
  { category: "HARM_CATEGORY_HATE_SPEECH", threshold: "BLOCK_MEDIUM_AND_ABOVE" },
  { category: "HARM_CATEGORY_SEXUALLY_EXPLICIT", threshold: "BLOCK_MEDIUM_AND_ABOVE" },
  { category: "HARM_CATEGORY_DANGEROUS_CONTENT", threshold: "BLOCK_MEDIUM_AND_ABOVE" }
];

export const AgentConfigSchema = z.object({
  models: z
    .object({
      default: z.string().min(1).optional(),
      generation: z.string().min(1).optional()
    })
    .default({}),
  generation: GenerationSettingsSchema.default({}),
  safety: z.array(SafetySettingSchema).default([...DEFAULT_SAFETY]),
  logging: z
    .object({
      directory: z.string().min(1).default("logs"),
      format: z.literal("jsonl").default("jsonl")
    })
    .default({})
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export const DEFAULT_GENERATION: GenerationSettings = GenerationSettingsSchema.parse({});

export async function loadAgentConfig(agentRoot: string): Promise<AgentConfig> {
  const configPath = path.join(agentRoot, "agent.json");
  const configRaw = await fs.readFile(configPath, "utf8");
  return AgentConfigSchema.parse(JSON.parse(configRaw));
}

export function toGeminiApiModel(modelId: string): string {
  let normalized = modelId.trim();
  for (const prefix of ["google/", "models/"]) {
    if (normalized.startsWith(prefix)) {
      normalized = normalized.slice(prefix.length);
    }
  }
  return normalized;
}

export function resolveGenerationModel(config: AgentConfig): string {
  return toGeminiApiModel(config.models.generation ?? config.models.default ?? DEFAULT_MODEL);
}

function resolveHomeDir(inputPath: string): string {
  if (inputPath === "~") {
    return os.homedir();
  }
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

export function resolveLogsDir(agentRoot: string, config: AgentConfig): string {
  return path.resolve(agentRoot, resolveHomeDir(config.logging.directory));
}
