export * from './line-classifier';
export * from './record-assembler';
export * from './chat-merger';
export * from './attendance.parser';
