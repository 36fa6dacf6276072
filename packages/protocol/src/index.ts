export * from './errors';
export * from './tenant';
export * from './identity';
export * from './comments';
export * from './commands';
export * from './notifications';
export * from './events';
export * from './messages';
