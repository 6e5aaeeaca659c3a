export * from './archive.types';
export * from './analysis.types';
