import { z } from "zod";

export const ResolverConfiguration = z.object({
  "ancestry.debug.trace": z
    .boolean()
    .describe(
      `Log every selection step of ancestor resolution and every skipped narrowing during a walk`
    )
    .default(false),
  "ancestry.walk.narrow": z
    .boolean()
    .describe(
      `Narrow the instance to each ancestor before visiting it; ancestors the instance does not narrow to are skipped`
    )
    .default(true),
});

export type ResolverConfiguration = z.infer<typeof ResolverConfiguration>;
