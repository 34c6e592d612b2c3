import { z } from "zod";
import { INTENTS } from "@/lib/capabilities/types";

const ValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// rows:<call_id>/<row index>/<column>  or  tree:/<JSON pointer into the diagnostic tree>
export const SourcePointerSchema = z.string().regex(/^(rows:[^/]+\/\d+\/.+|tree:(\/.*)?)$/);

export const FactPointSchema = z.object({
  dt: z.string().nullable(),
  value: z.number(),
  source: SourcePointerSchema,
});

export const HeadlineFactSchema = z.object({
  label: z.string(),
  metric: z.string(),
  from: FactPointSchema.nullable(),
  to: FactPointSchema,
  change: z.number().nullable(),
  /** Percent, e.g. -20 for a fall from 100 to 80. */
  change_pct: z.number().nullable(),
});

export const EvidenceItemSchema = z.object({
  label: z.string(),
  value: ValueSchema,
  source: SourcePointerSchema,
});

export const NotSupportedInfoSchema = z.object({
  subject: z.string(),
  reason: z.string(),
  missing_fields: z.array(z.string()),
  suggestion: z.string().nullable(),
});

export const AnswerStatusSchema = z.enum(["ok", "partial", "no_data", "failed", "not_supported"]);

export const AnswerPayloadSchema = z.object({
  status: AnswerStatusSchema,
  intent: z.enum(INTENTS),
  headline_facts: z.array(HeadlineFactSchema),
  evidence: z.array(EvidenceItemSchema),
  // The tree is checked structurally by verifyTraceability, not re-declared here.
  diagnostic_tree: z.record(z.unknown()).nullable(),
  assumptions: z.array(z.string()),
  limitations: z.array(z.string()),
  not_supported: NotSupportedInfoSchema.nullable(),
});

export type FactPoint = z.infer<typeof FactPointSchema>;
export type HeadlineFact = z.infer<typeof HeadlineFactSchema>;
export type EvidenceItem = z.infer<typeof EvidenceItemSchema>;
export type AnswerStatus = z.infer<typeof AnswerStatusSchema>;
export type NotSupportedInfo = z.infer<typeof NotSupportedInfoSchema>;
