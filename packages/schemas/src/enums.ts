import { z } from 'zod';

export const evidenceKindEnum = z.enum([
  'reference',
  'announcement',
  'case-study',
  'hiring-signal',
  'procurement',
  'event-mention',
]);
export type EvidenceKind = z.infer<typeof evidenceKindEnum>;

export const confidenceEnum = z.enum(['High', 'Medium', 'Low']);
export type Confidence = z.infer<typeof confidenceEnum>;

/** Ordinal rank used when keeping the best confidence; unset ranks lowest. */
export const CONFIDENCE_RANK: Record<Confidence, number> = {
  High: 3,
  Medium: 2,
  Low: 1,
};

export function confidenceRank(confidence: Confidence | null | undefined): number {
  return confidence ? CONFIDENCE_RANK[confidence] : 0;
}
