export * from './speaker-ranker';
export * from './session-activity.computer';
export * from './activity-report';
export * from './attendance.computer';
