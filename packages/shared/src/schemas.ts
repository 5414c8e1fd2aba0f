import { z } from 'zod';

export const mealKindSchema = z.enum(['lunch', 'dinner']);

export const groupDefinitionSchema = z.object({
  id: z.string().trim().min(1).max(100),
  meal: mealKindSchema,
  day: z.number().int().min(0).max(9999),
}).strict();

export const constraintSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('any') }).strict(),
  z.object({
    kind: z.literal('groups'),
    groups: z.array(z.string().trim().min(1)).min(1),
  }).strict(),
]);

export const personInputSchema = z.object({
  name: z.string().trim().min(1).max(200),
  constraint: constraintSpecSchema.default({ kind: 'any' }),
}).strict();

export const seedSchema = z.union([z.string().trim().min(1).max(100), z.number().int()]);

export const drawInputSchema = z.object({
  people: z.array(personInputSchema),
  groups: z.array(groupDefinitionSchema).min(1),
  seed: seedSchema.optional(),
}).strict().superRefine((input, ctx) => {
  const seen = new Set<string>();
  input.groups.forEach((group, index) => {
    if (seen.has(group.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['groups', index, 'id'],
        message: `Grupo duplicado: ${group.id}`,
      });
    }
    seen.add(group.id);
  });
});

export const textDrawSchema = z.object({
  message: z.string().min(1).max(100_000),
  seed: seedSchema.optional(),
}).strict();

export type DrawPayload = z.infer<typeof drawInputSchema>;
export type TextDrawPayload = z.infer<typeof textDrawSchema>;
