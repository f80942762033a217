export * from './types';
export * from './srtParser';
