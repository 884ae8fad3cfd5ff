// packages/ledger/src/schema.ts
import { z } from "zod";

import type { ContentField, FieldValue } from "./record.js";

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(FieldValueSchema),
    z.record(z.string(), FieldValueSchema),
  ])
);

export const ContentFieldSchema: z.ZodType<ContentField> = z.object({
  name: z.string().min(1),
  value: FieldValueSchema,
});

export const ContentFieldsSchema = z.array(ContentFieldSchema);

export const SeqSchema = z.number().int().min(1);

export const RangeSchema = z
  .object({
    from: SeqSchema.optional(),
    to: SeqSchema.optional(),
    anchor_hash: z.string().min(1).optional(),
    stop_at_first_break: z.boolean().optional(),
  })
  .refine((r) => r.from === undefined || r.to === undefined || r.to >= r.from, {
    message: "to must be >= from",
  });

const Primitive = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const TimeBound = z.union([z.string(), z.date()]);

export const HistoryFiltersSchema = z
  .object({
    actor: z.string().optional(),
    where: z.record(z.string(), Primitive).optional(),
    since: TimeBound.optional(),
    until: TimeBound.optional(),
    from: SeqSchema.optional(),
    to: SeqSchema.optional(),
    limit: z.number().int().min(1).optional(),
  })
  .refine((f) => f.from === undefined || f.to === undefined || f.to >= f.from, {
    message: "to must be >= from",
  });
