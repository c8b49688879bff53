import { createObservation, type Observation, type ObservationInput } from '@corroborate/schemas';

export function observation(overrides: Partial<ObservationInput> & Pick<ObservationInput, 'entityName'>): Observation {
  return createObservation({
    evidenceKind: 'reference',
    confidence: 'Medium',
    sourceLabel: 'Test Source',
    observedAt: new Date('2026-01-15T00:00:00Z'),
    ...overrides,
  });
}
