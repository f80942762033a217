import OpenAI from 'openai';
import fs from 'fs';
import { config } from '../config';
import { Segment, TranscriptionResult, WordTiming } from '../captions/types';
import { isRecord, UnknownRecord } from '../utils/guards';

export interface TranscribeOptions {
  /** ISO-639-1 language code, or 'auto' to let the model detect it */
  language?: string;
}

/**
 * Speech-to-text producing segments with word-level timings
 */
export interface Transcriber {
  transcribe(mediaPath: string, options?: TranscribeOptions): Promise<TranscriptionResult>;
}

/**
 * Configuration for OpenAI transcription
 */
export interface OpenAITranscriberConfig {
  apiKey: string;
  apiBase: string;
  model: string;
}

function readTimed(value: unknown): { start: number; end: number } | null {
  if (!isRecord(value) || typeof value.start !== 'number' || typeof value.end !== 'number') {
    return null;
  }
  return { start: value.start, end: value.end };
}

function readSegments(response: UnknownRecord): Segment[] {
  const raw = Array.isArray(response.segments) ? response.segments : [];
  const segments: Segment[] = [];

  for (const item of raw) {
    const timed = readTimed(item);
    if (timed && isRecord(item) && typeof item.text === 'string') {
      segments.push({ ...timed, text: item.text, words: [] });
    }
  }

  return segments;
}

function readWords(response: UnknownRecord): WordTiming[] {
  const raw = Array.isArray(response.words) ? response.words : [];
  const words: WordTiming[] = [];

  for (const item of raw) {
    const timed = readTimed(item);
    if (timed && isRecord(item) && typeof item.word === 'string') {
      words.push({ word: item.word, ...timed });
    }
  }

  return words;
}

/**
 * Converts a verbose_json transcription response into segments with words.
 * Words are assigned to the segment they start in; words past the last
 * segment end stay with the last segment.
 */
export function toTranscriptionResult(response: unknown): TranscriptionResult {
  if (!isRecord(response)) {
    throw new Error('Unexpected transcription response');
  }

  const segments = readSegments(response);
  const words = readWords(response);

  if (segments.length === 0) {
    const first = words[0];
    const last = words[words.length - 1];
    if (!first || !last) {
      return { segments: [] };
    }
    const text = typeof response.text === 'string' ? response.text : words.map((w) => w.word).join(' ');
    return { segments: [{ start: first.start, end: last.end, text, words }] };
  }

  let index = 0;
  for (const word of words) {
    while (index < segments.length - 1 && word.start >= (segments[index]?.end ?? 0)) {
      index++;
    }
    segments[index]?.words.push(word);
  }

  return { segments };
}

/**
 * OpenAI speech-to-text wrapper requesting word and segment timestamps
 */
export class OpenAITranscriber implements Transcriber {
  private client: OpenAI;
  private model: string;

  constructor(transcriberConfig?: Partial<OpenAITranscriberConfig>) {
    this.client = new OpenAI({
      apiKey: transcriberConfig?.apiKey ?? config.openaiApiKey,
      baseURL: transcriberConfig?.apiBase ?? config.openaiApiBase,
    });
    this.model = transcriberConfig?.model ?? config.transcriptionModel;
  }

  /**
   * Transcribes an audio or video file
   * @param mediaPath - Local file path
   * @param options - Language hint; 'auto' (default) omits it
   */
  async transcribe(mediaPath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const language = options.language ?? 'auto';
    console.info(`Transcribing ${mediaPath} with ${this.model} (language: ${language})`);

    const response: unknown = await this.client.audio.transcriptions.create({
      file: fs.createReadStream(mediaPath),
      model: this.model,
      response_format: 'verbose_json',
      timestamp_granularities: ['word', 'segment'],
      ...(language !== 'auto' ? { language } : {}),
    });

    const result = toTranscriptionResult(response);
    console.info(`Transcription produced ${result.segments.length} segments`);
    return result;
  }
}

/**
 * Whether an API key is configured for transcription
 */
export function isTranscriptionConfigured(): boolean {
  return !!config.openaiApiKey;
}
