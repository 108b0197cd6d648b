import { z } from 'zod';
import { ImageRecord } from '../types/image.js';

const CandidateIdSchema = z.object({
  id: z.string().min(1),
});

const CandidateSchema = z.object({
  id: z.string().min(1),
  urls: z.object({
    regular: z.string().min(1),
    full: z.string().min(1),
    raw: z.string().min(1),
  }),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  alt_description: z.string().nullish(),
  color: z.string(),
  likes: z.number().int().nonnegative(),
});

export type CandidateDecodeResult =
  | { ok: true; record: ImageRecord }
  | { ok: false; reason: string };

/** Returns the candidate's id, or null when it has none usable for dedup. */
export function candidateId(raw: unknown): string | null {
  const parsed = CandidateIdSchema.safeParse(raw);
  return parsed.success ? parsed.data.id : null;
}

export function decodeCandidate(raw: unknown): CandidateDecodeResult {
  const parsed = CandidateSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    return { ok: false, reason };
  }

  const c = parsed.data;
  const record: ImageRecord = Object.freeze({
    id: c.id,
    regularURL: c.urls.regular,
    fullURL: c.urls.full,
    rawURL: c.urls.raw,
    width: c.width,
    height: c.height,
    altText: c.alt_description ?? '',
    color: c.color,
    likes: c.likes,
  });
  return { ok: true, record };
}
