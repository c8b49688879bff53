export { LEGAL_SUFFIXES, collapseName, normalizeEntityName } from './entity-name';
export { createExclusionPolicy, defaultExclusionPolicy, type ExclusionPolicy } from './exclusion';
