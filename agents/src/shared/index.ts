export type { AdapterContext, AdapterError, AdapterResult, SourceAdapter } from './types.js';
export { AdapterRun, buildSearchQueryUrl, fillUrlTemplate } from './adapter-run.js';
export { defaultTargetProfile, parseTargetProfile, readTargetProfile } from './target-profile.js';
