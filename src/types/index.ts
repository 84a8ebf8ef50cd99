export * from './message.types';
export * from './metrics.types';
export * from './attendance.types';
export * from './report.types';
