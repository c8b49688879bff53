import { z } from 'zod';
import { confidenceEnum, evidenceKindEnum, type Confidence, type EvidenceKind } from './enums';

export const MAX_EXCERPT_LENGTH = 200;

const text = z.string().trim();

export const observationInputSchema = z.object({
  entityName: text,
  region: text.default(''),
  attributes: z.array(text).default([]),
  category: text.default(''),
  evidenceKind: evidenceKindEnum,
  confidence: confidenceEnum,
  sourceLabel: text,
  referenceUrl: text.default(''),
  excerpt: text.default(''),
  observedAt: z.coerce.date().optional(),
});

export type ObservationInput = z.input<typeof observationInputSchema>;

export interface Observation {
  readonly entityName: string;
  readonly region: string;
  readonly attributes: readonly string[];
  readonly category: string;
  readonly evidenceKind: EvidenceKind;
  readonly confidence: Confidence;
  readonly sourceLabel: string;
  readonly referenceUrl: string;
  readonly excerpt: string;
  readonly observedAt: Date;
}

/**
 * Validate raw adapter output and freeze it into an Observation.
 * Attributes are collapsed to distinct non-empty values (first occurrence wins),
 * the excerpt is cut to MAX_EXCERPT_LENGTH.
 */
export function createObservation(input: ObservationInput, now: () => Date = () => new Date()): Observation {
  const parsed = observationInputSchema.parse(input);
  const attributes = Object.freeze([...new Set(parsed.attributes.filter(Boolean))]);

  return Object.freeze({
    entityName: parsed.entityName,
    region: parsed.region,
    attributes,
    category: parsed.category,
    evidenceKind: parsed.evidenceKind,
    confidence: parsed.confidence,
    sourceLabel: parsed.sourceLabel,
    referenceUrl: parsed.referenceUrl,
    excerpt: parsed.excerpt.slice(0, MAX_EXCERPT_LENGTH),
    observedAt: parsed.observedAt ?? now(),
  });
}
