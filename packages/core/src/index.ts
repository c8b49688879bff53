/**
 * @corroborate/core: fetching, normalization and corroboration.
 */

export * from './config';
export * from './logging';
export * from './fetcher';
export * from './normalize';
export * from './aggregate';
