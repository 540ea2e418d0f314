export * from './conversation.reducer';
export * from './distribution.computer';
export * from './gap.analyser';
export * from './payload.assembler';
export * from './payload.cache';
export * from './summary.computer';
export * from './time-series.generator';
