export * from './types';
export * from './documentStore';
export * from './commands';
