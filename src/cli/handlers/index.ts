export * from './word-count';
export * from './hour-activity';
