export * from './types';
export * from './jobStore';
