export * from './corroboration';
export * from './ranking';
