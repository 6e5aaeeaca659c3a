export * from './format.utils';
