import { z } from 'zod';
import { confidenceEnum, evidenceKindEnum } from './enums';

export const entityRecordSchema = z.object({
  canonicalKey: z.string().min(1),
  displayName: z.string(),
  region: z.string(),
  attributes: z.array(z.string()),
  categories: z.array(z.string()),
  evidenceKinds: z.array(evidenceKindEnum).min(1),
  sources: z.array(z.string()),
  observationCount: z.number().int().min(1),
  bestConfidence: confidenceEnum.nullable(),
  corroborationScore: z.number().int().min(1),
  firstSeen: z.number().int().min(0),
});

export type EntityRecord = Readonly<z.infer<typeof entityRecordSchema>>;

export interface RejectionCounts {
  /** Observation names rejected by the exclusion policy before folding. */
  excluded: number;
  /** Canonical keys shorter than the minimum key length. */
  tooShort: number;
  /** Records dropped because their final canonical key is excluded. */
  excludedAfterMerge: number;
}

export interface InventoryResult {
  records: readonly EntityRecord[];
  rawObservationCount: number;
  rejected: RejectionCounts;
}
