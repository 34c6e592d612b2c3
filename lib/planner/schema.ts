import { z } from "zod";

// Tolerant shape of what the upstream extractor hands over. Anything malformed is caught
// here and left for the normalizer to coerce or drop; parsing never throws.

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const looseField = z.union([z.string(), z.number()]).nullable().optional().catch(undefined);

const ExplicitFlagSchema = z.union([z.boolean(), z.array(z.string())]).optional().catch(undefined);

export const RawTimeSpecSchema = z
  .object({
    mode: z.string().nullable().optional().catch(undefined),
    dt: looseField,
    days: looseField,
    start: looseField,
    end: looseField,
    explicit: ExplicitFlagSchema,
  })
  .passthrough();

export const RawToolHintSchema = z
  .object({
    name: z.string().optional(),
    tool: z.string().optional(),
    template_key: z.string().optional(),
    params: z.record(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export const RawPlanSchema = z
  .object({
    intent: z.string().nullable().optional().catch(undefined),
    time_spec: RawTimeSpecSchema.nullable().optional().catch(undefined),
    // Some extractors flatten the time fields onto the plan itself.
    dt: looseField,
    days: looseField,
    start: looseField,
    end: looseField,
    metrics: z
      .preprocess((value) => (typeof value === "string" ? [value] : value), z.array(z.unknown()))
      .optional()
      .catch(undefined),
    dimension: z.string().nullable().optional().catch(undefined),
    operation: z.string().nullable().optional().catch(undefined),
    tool_calls: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type ParsedRawPlan = z.output<typeof RawPlanSchema>;

export function parseScalar(value: unknown): z.infer<typeof ScalarSchema> | undefined {
  const parsed = ScalarSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}
