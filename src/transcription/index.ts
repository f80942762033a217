export * from './openaiTranscriber';
