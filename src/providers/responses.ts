/**
 * Parsing of structured model replies.
 * Models are asked for JSON but often wrap it in prose or code fences,
 * so the outermost object is cut out before validation.
 */

import { z } from 'zod';
import type { ComplexityLevel } from '../types/models.js';

const stringList = z.array(z.string()).catch([]);

export const ValidationVerdictSchema = z.object({
  is_valid: z.boolean(),
  confidence: z.number().transform((n) => Math.min(1, Math.max(0, n))),
  issues: stringList,
  suggestions: stringList,
});

const COMPLEXITY_SYNONYMS: Record<string, ComplexityLevel> = {
  low: 'low',
  simple: 'low',
  medium: 'medium',
  moderate: 'medium',
  high: 'high',
  complex: 'high',
};

export const MetadataSchema = z.object({
  project_name: z.string().trim().min(1),
  description: z.string().trim().min(1),
  project_type: z.string().trim().min(1),
  technologies: stringList,
  complexity_level: z
    .string()
    .transform((v) => COMPLEXITY_SYNONYMS[v.trim().toLowerCase()])
    .pipe(z.enum(['low', 'medium', 'high']))
    .catch('medium'),
  estimated_duration: z.string().trim().min(1).catch('unspecified'),
});

export const QualityVerdictSchema = z.object({
  overall_score: z.number().min(0).max(10),
  issues: stringList,
});

/** Cut the outermost `{...}` out of a reply and parse it. Returns undefined if that fails. */
export function extractJson(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  try {
    return JSON.parse(text.slice(start, end + 1)) as unknown;
  } catch {
    return undefined;
  }
}

export function parseReply<T extends z.ZodTypeAny>(schema: T, text: string): z.infer<T> | undefined {
  const result = schema.safeParse(extractJson(text));
  return result.success ? result.data : undefined;
}

/**
 * Strip a surrounding ```markdown (or bare ```) fence.
 * Content with fences only in its body is returned trimmed but otherwise intact.
 */
export function stripMarkdownFence(text: string): string {
  const trimmed = text.trim();
  const match = /^```(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n```$/i.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}
