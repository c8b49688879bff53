export {
  createSeedListAdapter,
  loadSeedEntities,
  seedEntitySchema,
  seedListAdapter,
  SEED_SOURCE_LABEL,
  type SeedEntity,
} from './seed-list.js';
export { customerStoriesAdapter } from './customer-stories.js';
export { expandPressQueries, pressReleasesAdapter } from './press-releases.js';
export { jobPostingsAdapter } from './job-postings.js';
export { procurementAdapter } from './procurement.js';
export { conferenceAdapter } from './conference.js';
export { SOURCE_ADAPTERS, sourceIds } from './registry.js';
