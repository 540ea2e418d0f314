export * from './conversation.loader';
export * from './message.flattener';
export * from './prompt.extractor';
