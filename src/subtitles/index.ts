export * from './types';
export * from './errors';
export * from './timestamp';
export * from './srtParser';
export * from './navigation';
export * from './mutations';
export * from './textBuffer';
export * from './subtitleDocument';
