export * from './ffmpeg';
