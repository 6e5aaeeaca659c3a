export * from './main';
export * from './program';
export * from './handlers';
