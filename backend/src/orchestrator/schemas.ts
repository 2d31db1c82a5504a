import { z } from 'zod';

// Model replies are loosely shaped: every field falls back instead of failing
// the whole object.

export const InputValidationReplySchema = z.object({
  status: z.enum(['valid', 'invalid', 'needs_clarification', 'off_topic']).catch('valid'),
  is_safe: z.boolean().catch(true),
  is_clear: z.boolean().catch(true),
  is_relevant: z.boolean().catch(true),
  reason: z.string().catch(''),
  suggested_clarification: z.string().optional().catch(undefined)
});

const IntentEntitySchema = z.object({
  type: z.string().catch('other'),
  value: z.coerce.string(),
  context: z.string().optional().catch(undefined)
});

export const IntentReplySchema = z.object({
  primary_intent: z.string().min(1),
  entities: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item) => {
        const parsed = IntentEntitySchema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      })
    ),
  constraints: z.array(z.coerce.string()).catch([]),
  requires_live_data: z.boolean().catch(false),
  confidence: z.number().catch(0.5).transform((value) => Math.min(1, Math.max(0, value))),
  summary: z.string().optional().catch(undefined)
});

export const PlanItemSchema = z.object({
  name: z.string().min(1),
  args: z.record(z.unknown()).catch({}),
  purpose: z.string().catch(''),
  priority: z.number().int().optional().catch(undefined)
});

export const PlanReplySchema = z.object({
  tool_plan: z.array(z.unknown()).catch([]),
  execution_strategy: z.enum(['sequential', 'parallel']).catch('sequential'),
  reasoning: z.string().optional().catch(undefined)
});

export type InputValidationReply = z.infer<typeof InputValidationReplySchema>;
export type IntentReply = z.infer<typeof IntentReplySchema>;
export type PlanReply = z.infer<typeof PlanReplySchema>;
