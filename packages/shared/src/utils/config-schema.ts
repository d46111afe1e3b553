/**
 * Zod schemas for CLI configuration.
 *
 * Validates the scalar parts of a CliConfig at build time, so that a
 * misconfigured CLI fails at startup rather than on first use.
 */

import { z } from "zod";

/** `-x` or `--long-name`; no whitespace, no bare dashes. */
export const OptionSpellingSchema = z
  .string()
  .regex(/^--?[^-\s]\S*$/, "Option spelling must start with - or -- followed by a name");

export const AliasTableSchema = z.record(
  z.string().min(1, "Alias must not be empty"),
  z.string().min(1, "Alias target must not be empty"),
);

export const CliConfigSchema = z.object({
  name: z
    .string()
    .min(1, "CLI name must not be empty")
    .regex(/^\S+$/, "CLI name must not contain whitespace"),
  version: z.string().min(1, "Version must not be empty").optional(),
  description: z.string().optional(),
  aliases: AliasTableSchema.optional(),
  helpFlag: z.boolean().optional(),
  helpCommand: z.boolean().optional(),
});

export type ValidatedCliConfig = z.infer<typeof CliConfigSchema>;
