/**
 * Zod schema for validating the optional .lcov-prune/config.yaml.
 */

import { z } from 'zod';

export const DelegatePrefixSchema = z.object({
  from: z.string().min(1),
  to: z.string(),
});

export const PruneConfigSchema = z
  .object({
    version: z.literal(1),
    library_dir: z.string(),
    test_globs: z.array(z.string().min(1)),
    ignore_globs: z.array(z.string().min(1)),
    tested_aliases: z.array(z.string().min(1)),
    delegate_prefixes: z.array(DelegatePrefixSchema),
    lookup_errors: z.enum(['skip', 'fail']),
    recount_summaries: z.boolean(),
  })
  .strict();

export type ValidatedPruneConfig = z.infer<typeof PruneConfigSchema>;

/**
 * Safely validate a PruneConfig, returning the issues as `path: message` strings on failure.
 */
export function safeParsePruneConfig(
  raw: unknown,
): { success: true; data: ValidatedPruneConfig } | { success: false; errors: string[] } {
  const result = PruneConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errors = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return { success: false, errors };
}
