import { describe, expect, it } from "vitest";
import { ANALYSIS_REQUEST_FIELDS } from "../schemas/analysis_request.schema";
import { fillPlaceholders, fillTemplateTree, toPlaceholderValues } from "../utils/template";

describe("fillPlaceholders", () => {
  it("substitutes known keys and trims their values", () => {
    expect(fillPlaceholders("Nicho: {{segmento}}, R$ {{preco}}", { segmento: " coaching ", preco: 997 })).toBe(
      "Nicho: coaching, R$ 997"
    );
  });

  it("uses the inline default, then the fallback, for blank values", () => {
    const values = { segmento: "  ", produto: undefined };

    expect(fillPlaceholders("{{segmento|geral}} / {{produto}}", values, "n/d")).toBe("geral / n/d");
  });

  it("leaves unknown keys in place", () => {
    expect(fillPlaceholders("{{segmento}} {{CONTEXT_SECTIONS}}", { segmento: "fitness" })).toBe(
      "fitness {{CONTEXT_SECTIONS}}"
    );
  });

  it("does not expand markers inside substituted values", () => {
    expect(fillPlaceholders("{{a}}", { a: "{{b}}", b: "x" })).toBe("{{b}}");
  });

  it("ignores keys inherited from the prototype", () => {
    expect(fillPlaceholders("{{toString}}", {})).toBe("{{toString}}");
  });
});

describe("fillTemplateTree", () => {
  it("fills strings at any depth and keeps other values", () => {
    const tree = {
      nicho: "{{segmento|digital}}",
      palavras: ["{{segmento}}", "mentoria"],
      nested: { score: 7, ativo: true, nada: null }
    };

    expect(fillTemplateTree(tree, { segmento: "coaching" })).toEqual({
      nicho: "coaching",
      palavras: ["coaching", "mentoria"],
      nested: { score: 7, ativo: true, nada: null }
    });
  });
});

describe("toPlaceholderValues", () => {
  it("declares every request field, including absent ones", () => {
    const values = toPlaceholderValues({ segmento: "coaching", preco: 997 });

    expect(Object.keys(values)).toEqual([...ANALYSIS_REQUEST_FIELDS]);
    expect(values.segmento).toBe("coaching");
    expect(values.preco).toBe(997);
    expect(values.publico).toBeUndefined();
  });
});
