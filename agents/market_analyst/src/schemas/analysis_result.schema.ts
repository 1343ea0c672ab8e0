import { z } from "zod";

const ObjectSection = z.record(z.unknown());
const ListSection = z.array(z.unknown());

export const AnalysisSectionsSchema = z.object({
  avatar_ultra_detalhado: ObjectSection,
  drivers_mentais_customizados: ListSection,
  provas_visuais_sugeridas: ListSection,
  escopo_posicionamento: ObjectSection,
  analise_concorrencia_profunda: ObjectSection,
  estrategia_palavras_chave: ObjectSection,
  sistema_anti_objecao: ObjectSection,
  pre_pitch_invisivel: ObjectSection,
  metricas_performance_ultra: ObjectSection,
  plano_acao_ultra_detalhado: ObjectSection,
  insights_exclusivos_ultra: z.array(z.string()),
  sistema_monitoramento: ObjectSection
});

export type AnalysisSections = z.infer<typeof AnalysisSectionsSchema>;

export type AnalysisSectionName = keyof AnalysisSections;

export const ANALYSIS_SECTIONS = AnalysisSectionsSchema.keyof().options;

export const PartialAnalysisSectionsSchema = AnalysisSectionsSchema.partial();

export const AnalysisMetadataSchema = z.object({
  generated_at: z.string().min(1),
  model: z.string().min(1),
  version: z.string().min(1),
  analysis_type: z.enum(["ultra_detailed", "heuristic_extraction", "emergency_fallback"]),
  systems_implemented: z.array(z.string()).optional(),
  recovered_sections: z.array(z.string()).optional(),
  note: z.string().optional()
});

export type AnalysisMetadata = z.infer<typeof AnalysisMetadataSchema>;

// Decoded model output: any JSON object. Sections the model skipped are not filled in.
export const AnalysisDocumentSchema = z.record(z.unknown());

export type AnalysisResult = Record<string, unknown> & {
  metadata_gemini: AnalysisMetadata;
};

export type AnalysisQuality = "full" | "heuristic" | "fallback";

export type AnalysisOutcome =
  | { quality: "full"; analysis: AnalysisResult }
  | { quality: "heuristic"; analysis: AnalysisResult; reason: string }
  | { quality: "fallback"; analysis: AnalysisResult; reason: string };
