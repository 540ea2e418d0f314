export * from './conversation.types';
export * from './message.types';
export * from './analysis.types';
export * from './payload.types';
