import { promises as fs } from "fs";
import path from "path";
import type { AnalysisRequest } from "../schemas/analysis_request.schema";
import { fillPlaceholders, toPlaceholderValues } from "./template";

export const NOT_INFORMED = "Não informado";
export const SEARCH_CONTEXT_HEADER = "## CONTEXTO DE PESQUISA PROFUNDA:";
export const ATTACHMENTS_CONTEXT_HEADER = "## CONTEXTO DOS ANEXOS:";
export const CONNECTION_TEST_PROMPT = "Teste de conexão. Responda apenas: OK";

const CONTEXT_MARKER = "{{CONTEXT_SECTIONS}}";

export async function loadPromptTemplate(agentRoot: string): Promise<string> {
  const promptPath = path.join(agentRoot, "prompts", "ultra_analysis.md");
  return fs.readFile(promptPath, "utf8");
}

function toContextSection(header: string, context: string | undefined): string {
  const trimmed = context?.trim() ?? "";
  return trimmed ? `\n${header}\n${trimmed}\n` : "";
}

export function buildAnalysisPrompt(
  template: string,
  params: AnalysisRequest,
  searchContext?: string,
  attachmentsContext?: string
): string {
  const contextSections =
    toContextSection(SEARCH_CONTEXT_HEADER, searchContext) +
    toContextSection(ATTACHMENTS_CONTEXT_HEADER, attachmentsContext);

  // Context goes in last so caller text is never scanned for field markers.
  const filled = fillPlaceholders(template, toPlaceholderValues(params), NOT_INFORMED);
  return filled.replace(CONTEXT_MARKER, () => contextSections);
}
