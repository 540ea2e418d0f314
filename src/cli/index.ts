export * from './cli.utils';
export * from './main';
export * from './output';
export * from './report';
