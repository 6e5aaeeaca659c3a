export * from './telegram.parser';
