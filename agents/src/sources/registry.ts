import { conferenceAdapter } from './conference.js';
import { customerStoriesAdapter } from './customer-stories.js';
import { jobPostingsAdapter } from './job-postings.js';
import { pressReleasesAdapter } from './press-releases.js';
import { procurementAdapter } from './procurement.js';
import { seedListAdapter } from './seed-list.js';
import type { SourceAdapter } from '../shared/types.js';

/** Bundled adapters in default activation order. */
export const SOURCE_ADAPTERS: readonly SourceAdapter[] = [
  seedListAdapter,
  customerStoriesAdapter,
  pressReleasesAdapter,
  jobPostingsAdapter,
  procurementAdapter,
  conferenceAdapter,
];

export function sourceIds(): string[] {
  return SOURCE_ADAPTERS.map((adapter) => adapter.id);
}
