import {
  ANALYSIS_REQUEST_FIELDS,
  type AnalysisRequest
} from "../schemas/analysis_request.schema";

export type PlaceholderValues = Record<string, string | number | undefined>;

const PLACEHOLDER_PATTERN = /\{\{(\w+)(?:\|([^}]*))?\}\}/g;

function isBlank(value: string | number | undefined): value is undefined | "" {
  return value === undefined || (typeof value === "string" && value.trim() === "");
}

/**
 * Replaces `{{key}}` and `{{key|default}}` markers in a single pass.
 * Keys that are not own properties of `values` stay untouched, so later
 * stages can fill them; known keys with a blank value take the inline
 * default, then `fallback`.
 */
export function fillPlaceholders(text: string, values: PlaceholderValues, fallback = ""): string {
  return text.replace(PLACEHOLDER_PATTERN, (marker: string, key: string, inlineDefault?: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) return marker;
    const value = values[key];
    if (isBlank(value)) return inlineDefault ?? fallback;
    return String(value).trim();
  });
}

export function fillTemplateTree(node: unknown, values: PlaceholderValues): unknown {
  if (typeof node === "string") return fillPlaceholders(node, values);
  if (Array.isArray(node)) return node.map((item) => fillTemplateTree(item, values));
  if (node !== null && typeof node === "object") {
    return Object.fromEntries(
      Object.entries(node).map(([key, value]) => [key, fillTemplateTree(value, values)])
    );
  }
  return node;
}

/** Every request field becomes an own key, so absent fields still count as known markers. */
export function toPlaceholderValues(request: AnalysisRequest): PlaceholderValues {
  const values: PlaceholderValues = {};
  for (const field of ANALYSIS_REQUEST_FIELDS) {
    values[field] = request[field];
  }
  return values;
}
