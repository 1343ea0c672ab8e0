import { z } from "zod";

const TextField = z.string().optional();
const AmountField = z.union([z.string(), z.number()]).optional();

export const AnalysisRequestSchema = z.object({
  segmento: TextField,
  produto: TextField,
  publico: TextField,
  preco: AmountField,
  concorrentes: TextField,
  objetivo_receita: AmountField,
  orcamento_marketing: AmountField,
  prazo_lancamento: TextField,
  dados_adicionais: TextField
});

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

export type AnalysisRequestField = keyof AnalysisRequest;

export const ANALYSIS_REQUEST_FIELDS = AnalysisRequestSchema.keyof().options;
