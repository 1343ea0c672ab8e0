import type { AnalysisOutcome } from "../schemas/analysis_result.schema";

const QUALITY_LABELS: Record<AnalysisOutcome["quality"], string> = {
  full: "Full analysis",
  heuristic: "Heuristic extraction (response did not decode)",
  fallback: "Emergency fallback (Gemini call failed)"
};

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function asText(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function asTextList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(asText).filter((item): item is string => item !== null);
}

function pushList(lines: string[], title: string, items: string[]): void {
  if (items.length === 0) return;
  lines.push(`## ${title}`);
  items.forEach((item) => lines.push(`- ${item}`));
  lines.push("");
}

export function toMarkdownReport(outcome: AnalysisOutcome, dateStamp: string): string {
  const { analysis } = outcome;
  const avatar = asRecord(analysis.avatar_ultra_detalhado);
  const positioning = asRecord(analysis.escopo_posicionamento);
  const lines: string[] = [];

  lines.push(`# Market Analysis (${dateStamp})`);
  lines.push("");
  lines.push(`- Quality: ${QUALITY_LABELS[outcome.quality]}`);
  if (outcome.quality !== "full") {
    lines.push(`- Reason: ${outcome.reason}`);
  }
  lines.push(`- Model: ${analysis.metadata_gemini.model}`);
  lines.push(`- Generated at: ${analysis.metadata_gemini.generated_at}`);
  lines.push("");

  const avatarName = asText(avatar.nome_ficticio);
  if (avatarName) {
    lines.push("## Avatar");
    lines.push(avatarName);
    lines.push("");
  }
  pushList(lines, "Pains", asTextList(avatar.dores_viscerais));
  pushList(lines, "Desires", asTextList(avatar.desejos_secretos));
  pushList(lines, "Objections", asTextList(avatar.objecoes_reais));

  const positioningFields: Array<[string, unknown]> = [
    ["Niche", positioning.nicho_especifico],
    ["Positioning", positioning.posicionamento_mercado],
    ["Value proposition", positioning.proposta_valor_unica],
    ["Core message", positioning.mensagem_central]
  ];
  const positioningLines = positioningFields
    .map(([label, value]) => {
      const text = asText(value);
      return text ? `${label}: ${text}` : null;
    })
    .filter((line): line is string => line !== null);
  pushList(lines, "Positioning", positioningLines);

  const driverList: unknown[] = Array.isArray(analysis.drivers_mentais_customizados)
    ? analysis.drivers_mentais_customizados
    : [];
  const drivers = driverList
    .map((driver) => asText(asRecord(driver).nome))
    .filter((name): name is string => name !== null);
  pushList(lines, "Mental Drivers", drivers);

  pushList(lines, "Insights", asTextList(analysis.insights_exclusivos_ultra));

  return lines.join("\n");
}
