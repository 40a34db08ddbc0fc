import { z } from 'zod';
import { SECURITY_LEVELS, SIZE_PREFERENCES, type Requirements } from '../../types';
import { RequirementsError } from '../errors';
import { isValidConstraint } from './version-match';

const LANGUAGE_ALIASES: Record<string, string> = {
  nodejs: 'node',
  'node.js': 'node',
  golang: 'go',
  '.net': 'dotnet',
  csharp: 'dotnet',
  python3: 'python',
  jdk: 'java',
};

/**
 * Lower-cased language name as the normalizer records it.
 */
export function canonicalLanguage(language: string): string {
  const lower = language.trim().toLowerCase();
  return LANGUAGE_ALIASES[lower] ?? lower;
}

const ceiling = z.number().int().nonnegative().optional();

export const RequirementsSchema = z.object({
  language: z.string().trim().min(1, 'language is required').transform(canonicalLanguage),
  version: z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined))
    .refine(value => value === undefined || isValidConstraint(value), {
      message: 'version constraint is not understood',
    }),
  packages: z.array(z.string().trim().min(1)).optional(),
  sizePreference: z.enum(SIZE_PREFERENCES).default('balanced'),
  securityLevel: z.enum(SECURITY_LEVELS).default('high'),
  maxCritical: ceiling,
  maxHigh: ceiling,
  maxTotal: ceiling,
  excludePlatformTags: z.boolean().optional(),
});

export type RequirementsInput = z.input<typeof RequirementsSchema>;

export function parseRequirements(input: unknown): Requirements {
  const parsed = RequirementsSchema.safeParse(input);
  if (!parsed.success) {
    throw new RequirementsError(
      parsed.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    );
  }
  return parsed.data;
}
