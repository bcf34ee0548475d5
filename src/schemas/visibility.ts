import { z } from "zod";

/**
 * Access scope attached to every artifact.
 * Enforced on delivery and on context reads.
 */
export const VisibilitySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("public") }).strict(),
  z
    .object({
      kind: z.literal("private"),
      agents: z.array(z.string().min(1)),
    })
    .strict(),
  z
    .object({
      kind: z.literal("labelled"),
      required_labels: z.array(z.string().min(1)).min(1),
    })
    .strict(),
  z
    .object({
      kind: z.literal("tenant"),
      tenant_id: z.string().min(1),
    })
    .strict(),
]);

export type Visibility = z.infer<typeof VisibilitySchema>;
