/**
 * Shared data contracts between adapters, core and reporting.
 */

export * from './enums';
export * from './observation';
export * from './entity';
export * from './target-profile';
