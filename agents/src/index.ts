/**
 * @corroborate/agents - source adapters
 *
 * - sources/  : one adapter per evidence source, plus the registry
 * - extract/  : name, tag and region heuristics applied to page text
 * - html/     : listing and search-result parsing
 * - shared/   : adapter contracts, per-run helper, target profile loading
 */

export * from './shared/index.js';
export * from './extract/index.js';
export * from './html/index.js';
export * from './sources/index.js';
