import { describe, expect, it } from "vitest";
import type { AnalysisOutcome } from "../schemas/analysis_result.schema";
import { toMarkdownReport } from "../utils/report";

const metadata = {
  generated_at: "2024-05-01T12:00:00.000Z",
  model: "gemini-1.5-flash",
  version: "2.0.0",
  analysis_type: "ultra_detailed" as const
};

describe("toMarkdownReport", () => {
  it("renders only the header for an analysis without known sections", () => {
    const outcome: AnalysisOutcome = { quality: "full", analysis: { foo: 1, metadata_gemini: metadata } };

    expect(toMarkdownReport(outcome, "20240501")).toBe(
      "# Market Analysis (20240501)\n\n- Quality: Full analysis\n- Model: gemini-1.5-flash\n- Generated at: 2024-05-01T12:00:00.000Z\n"
    );
  });

  it("renders the avatar, positioning, drivers and insights", () => {
    const outcome: AnalysisOutcome = {
      quality: "full",
      analysis: {
        avatar_ultra_detalhado: {
          nome_ficticio: "Carla",
          dores_viscerais: ["Agenda vazia", "  "],
          objecoes_reais: ["Já tentei antes"]
        },
        escopo_posicionamento: { nicho_especifico: "coaching", mensagem_central: "Agenda cheia em 90 dias" },
        drivers_mentais_customizados: [{ nome: "Agenda Cheia" }, { descricao: "sem nome" }],
        insights_exclusivos_ultra: ["Coaches compram prova social"],
        metadata_gemini: metadata
      }
    };

    expect(toMarkdownReport(outcome, "20240501").split("\n").slice(6)).toEqual([
      "## Avatar",
      "Carla",
      "",
      "## Pains",
      "- Agenda vazia",
      "",
      "## Objections",
      "- Já tentei antes",
      "",
      "## Positioning",
      "- Niche: coaching",
      "- Core message: Agenda cheia em 90 dias",
      "",
      "## Mental Drivers",
      "- Agenda Cheia",
      "",
      "## Insights",
      "- Coaches compram prova social",
      ""
    ]);
  });

  it("states the reason for a degraded analysis", () => {
    const outcome: AnalysisOutcome = {
      quality: "fallback",
      reason: "Empty response from Gemini.",
      analysis: {
        metadata_gemini: { ...metadata, model: "emergency_fallback", analysis_type: "emergency_fallback" }
      }
    };

    expect(toMarkdownReport(outcome, "20240501").split("\n").slice(0, 6)).toEqual([
      "# Market Analysis (20240501)",
      "",
      "- Quality: Emergency fallback (Gemini call failed)",
      "- Reason: Empty response from Gemini.",
      "- Model: emergency_fallback",
      "- Generated at: 2024-05-01T12:00:00.000Z"
    ]);
  });
});
