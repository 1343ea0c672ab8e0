import type { AnalysisRequest } from "../schemas/analysis_request.schema";
import {
  ANALYSIS_SECTIONS,
  AnalysisDocumentSchema,
  AnalysisSectionsSchema,
  PartialAnalysisSectionsSchema,
  type AnalysisOutcome,
  type AnalysisResult,
  type AnalysisSections
} from "../schemas/analysis_result.schema";
import { describeError, ResponseDecodeError } from "./errors";
import {
  ANALYSIS_VERSION,
  buildEmergencyFallback,
  renderSections,
  type FallbackTemplates
} from "./fallbacks";

export const SYSTEMS_IMPLEMENTED = [
  "drivers_mentais",
  "provas_visuais",
  "pre_pitch_invisivel",
  "anti_objecao",
  "ancoragem_psicologica"
];

export const RAW_RESPONSE_LIMIT = 2000;
const LOG_EXCERPT_LIMIT = 1000;
const FENCE = "```";

export type ParserContext = {
  model: string;
  request: AnalysisRequest;
  fallbacks: FallbackTemplates;
  now?: () => Date;
};

type JsonAttempt = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParseJson(text: string): JsonAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error: unknown) {
    return { ok: false, error };
  }
}

/**
 * Returns the body of the first fenced block. The language tag on the opening
 * line is dropped; a reply cut off before its closing fence keeps the rest of
 * the text.
 */
export function stripCodeFence(text: string): string {
  const open = text.indexOf(FENCE);
  if (open < 0) return text.trim();

  let start = open + FENCE.length;
  const lineEnd = text.indexOf("\n", start);
  if (lineEnd >= 0 && /^[\w-]*[ \t]*\r?$/.test(text.slice(start, lineEnd))) {
    start = lineEnd + 1;
  }

  const close = text.lastIndexOf(FENCE);
  const end = close >= start ? close : text.length;
  return text.slice(start, end).trim();
}

export function extractFirstJsonObject(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed;
  }
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return trimmed.slice(start, end + 1);
  }
  return trimmed;
}

export function decodeAnalysisDocument(text: string): Record<string, unknown> {
  const stripped = stripCodeFence(text);
  const candidates = [stripped];
  const objectSpan = extractFirstJsonObject(stripped);
  if (objectSpan !== stripped) candidates.push(objectSpan);

  let lastError: unknown = null;
  for (const candidate of candidates) {
    const attempt = tryParseJson(candidate);
    if (!attempt.ok) {
      lastError = attempt.error;
      continue;
    }
    const document = AnalysisDocumentSchema.safeParse(attempt.value);
    if (document.success) return document.data;
    lastError = new Error("Response JSON is not an object.");
  }
  throw new ResponseDecodeError(describeError(lastError));
}

function readBalancedValue(text: string, start: number): string | null {
  const opener = text[start];
  if (opener !== "{" && opener !== "[") return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      depth += 1;
    } else if (ch === "}" || ch === "]") {
      depth -= 1;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Pulls every top-level section whose value is complete and well formed out of
 * a reply that does not decode as a whole (typically one cut off mid-way).
 */
export function recoverSections(text: string): Partial<AnalysisSections> {
  const recovered: Record<string, unknown> = {};

  for (const name of ANALYSIS_SECTIONS) {
    const pattern = new RegExp(`"${name}"\\s*:\\s*`, "g");
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      const raw = readBalancedValue(text, match.index + match[0].length);
      if (raw === null) continue;
      const attempt = tryParseJson(raw);
      if (attempt.ok && AnalysisSectionsSchema.shape[name].safeParse(attempt.value).success) {
        recovered[name] = attempt.value;
        break;
      }
    }
  }

  return PartialAnalysisSectionsSchema.parse(recovered);
}

export function buildHeuristicAnalysis(rawText: string, context: ParserContext): AnalysisResult {
  const now = context.now ?? (() => new Date());
  const sections = renderSections(context.fallbacks.heuristic, context.request);
  const recovered = recoverSections(rawText);
  const recoveredNames = ANALYSIS_SECTIONS.filter((name) => recovered[name] !== undefined);

  return {
    ...sections,
    ...recovered,
    raw_response: rawText.slice(0, RAW_RESPONSE_LIMIT),
    metadata_gemini: {
      generated_at: now().toISOString(),
      model: context.model,
      version: ANALYSIS_VERSION,
      analysis_type: "heuristic_extraction",
      recovered_sections: recoveredNames
    }
  };
}

export function parseAnalysisResponse(rawText: string, context: ParserContext): AnalysisOutcome {
  const now = context.now ?? (() => new Date());

  let document: Record<string, unknown>;
  try {
    document = decodeAnalysisDocument(rawText);
  } catch (error: unknown) {
    const reason = describeError(error);
    console.error(`Analysis JSON decode failed: ${reason}`);
    console.error(`Response received: ${rawText.slice(0, LOG_EXCERPT_LIMIT)}...`);
    try {
      return { quality: "heuristic", analysis: buildHeuristicAnalysis(rawText, context), reason };
    } catch (secondary: unknown) {
      const secondaryReason = describeError(secondary);
      console.error(`Heuristic extraction failed: ${secondaryReason}`);
      return {
        quality: "fallback",
        analysis: buildEmergencyFallback(context.fallbacks, context.request, now()),
        reason: secondaryReason
      };
    }
  }

  const missing = ANALYSIS_SECTIONS.filter((name) => !(name in document));
  if (missing.length > 0) {
    console.warn(`Analysis is missing sections: ${missing.join(", ")}`);
  }

  return {
    quality: "full",
    analysis: {
      ...document,
      metadata_gemini: {
        generated_at: now().toISOString(),
        model: context.model,
        version: ANALYSIS_VERSION,
        analysis_type: "ultra_detailed",
        systems_implemented: [...SYSTEMS_IMPLEMENTED]
      }
    }
  };
}
