export * from './message.filter';
export * from './word-frequency.computer';
export * from './hourly-activity.computer';
