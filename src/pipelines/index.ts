export * from './captionPipeline';
