import { z } from 'zod';
import { ValidationError } from '@competency-search/common';

import { COMPETENCY_TYPES, LANGUAGES, PROVIDERS, type Competency } from './types';

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required.` }).refine((value) => value.trim().length > 0, {
    message: `${field} must not be empty.`
  });

export const competencySchema = z.object({
  code: nonBlank('code'),
  lang: z.enum(LANGUAGES),
  type: z.enum(COMPETENCY_TYPES),
  provider: z.enum(PROVIDERS),
  title: nonBlank('title'),
  url: z.string().optional(),
  category: z.string().optional(),
  description: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  indexed_text: z.string().optional(),
  metadata: z.record(z.unknown()).optional()
});

export function parseCompetency(raw: unknown): Competency {
  const parsed = competencySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    throw new ValidationError('Competency failed validation.', { details: { issues } });
  }

  return parsed.data;
}

/** `"Title. Description"`, or the bare title when there is no description. */
export function defaultIndexedText(competency: Pick<Competency, 'title' | 'description'>): string {
  const title = competency.title.trim();
  const description = competency.description?.trim();
  return description ? `${title}. ${description}` : title;
}

export function withIndexedText(competency: Competency): Competency {
  if (competency.indexed_text && competency.indexed_text.trim().length > 0) {
    return competency;
  }

  return { ...competency, indexed_text: defaultIndexedText(competency) };
}
