import { promises as fs } from "fs";
import path from "path";
import type { AnalysisRequest } from "../schemas/analysis_request.schema";
import {
  AnalysisSectionsSchema,
  PartialAnalysisSectionsSchema,
  type AnalysisResult,
  type AnalysisSections
} from "../schemas/analysis_result.schema";
import { fillTemplateTree, toPlaceholderValues } from "./template";

export const ANALYSIS_VERSION = "2.0.0";
export const EMERGENCY_MODEL_TAG = "emergency_fallback";
export const EMERGENCY_NOTE = "Análise gerada em modo de emergência devido a erro na IA principal";

export type FallbackTemplates = {
  heuristic: AnalysisSections;
  emergency: AnalysisSections;
};

async function readSections(filePath: string) {
  const raw = await fs.readFile(filePath, "utf8");
  try {
    return PartialAnalysisSectionsSchema.parse(JSON.parse(raw));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid fallback asset ${filePath}: ${message}`);
  }
}

/** Heuristic and emergency records share the baseline and override a few sections each. */
export async function loadFallbackTemplates(agentRoot: string): Promise<FallbackTemplates> {
  const dataDir = path.join(agentRoot, "data");
  const [baseline, heuristic, emergency] = await Promise.all([
    readSections(path.join(dataDir, "fallback_baseline.json")),
    readSections(path.join(dataDir, "heuristic_analysis.json")),
    readSections(path.join(dataDir, "emergency_analysis.json"))
  ]);

  return {
    heuristic: AnalysisSectionsSchema.parse({ ...baseline, ...heuristic }),
    emergency: AnalysisSectionsSchema.parse({ ...baseline, ...emergency })
  };
}

export function renderSections(template: AnalysisSections, request: AnalysisRequest): AnalysisSections {
  return AnalysisSectionsSchema.parse(fillTemplateTree(template, toPlaceholderValues(request)));
}

export function buildEmergencyFallback(
  templates: FallbackTemplates,
  request: AnalysisRequest,
  now: Date = new Date()
): AnalysisResult {
  return {
    ...renderSections(templates.emergency, request),
    metadata_gemini: {
      generated_at: now.toISOString(),
      model: EMERGENCY_MODEL_TAG,
      version: ANALYSIS_VERSION,
      analysis_type: "emergency_fallback",
      note: EMERGENCY_NOTE
    }
  };
}
