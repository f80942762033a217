import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CaptionPipeline, CaptionPipelineDeps } from './captionPipeline';
import { SourceRetrievalError } from '../captions/errors';
import { CaptionRequest, TranscriptionResult } from '../captions/types';
import { FontSet } from '../fonts/fontCatalog';
import { JobStore } from '../jobs/jobStore';
import { MediaFetcher } from '../media/download';
import { Transcriber } from '../transcription/openaiTranscriber';
import { VideoMetadataProbe } from '../video/ffmpeg';

const VIDEO_URL = 'https://example.com/clip.mp4';
const POS = String.raw`{\an5\pos(960,540)}`;

const spoken: TranscriptionResult = {
  segments: [
    {
      start: 0.5,
      end: 1.5,
      text: ' hi there',
      words: [
        { word: ' hi', start: 0.5, end: 1 },
        { word: ' there', start: 1, end: 1.5 },
      ],
    },
  ],
};

const assInput = [
  '[Script Info]',
  'ScriptType: v4.00+',
  '',
  '[Events]',
  'Dialogue: 0,0:00:00.00,0:00:05.00,Default,,0,0,0,,drop me',
  'Dialogue: 0,0:00:05.00,0:00:06.00,Default,,0,0,0,,keep me',
].join('\n');

interface Fakes {
  media: {
    downloadFile: Mock<MediaFetcher['downloadFile']>;
    fetchText: Mock<MediaFetcher['fetchText']>;
  };
  video: {
    getResolution: Mock<VideoMetadataProbe['getResolution']>;
    probeDuration: Mock<VideoMetadataProbe['probeDuration']>;
  };
  transcriber: { transcribe: Mock<Transcriber['transcribe']> };
  snapshot: Mock<() => Promise<FontSet>>;
}

describe('CaptionPipeline', () => {
  let tmpDir: string;
  let outputsDir: string;
  let store: JobStore;
  let fakes: Fakes;
  let pipeline: CaptionPipeline;

  function build(overrides: Partial<CaptionPipelineDeps> = {}): CaptionPipeline {
    return new CaptionPipeline({
      fonts: { snapshot: fakes.snapshot },
      video: fakes.video,
      transcriber: fakes.transcriber,
      media: fakes.media,
      store,
      outputsDir,
      ...overrides,
    });
  }

  function outputFiles(): string[] {
    return fs.existsSync(outputsDir) ? fs.readdirSync(outputsDir) : [];
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'caption-pipeline-'));
    outputsDir = path.join(tmpDir, 'outputs');
    store = new JobStore(path.join(tmpDir, 'jobs'), path.join(tmpDir, 'work'));

    fakes = {
      media: {
        downloadFile: vi.fn<MediaFetcher['downloadFile']>(async (_url, directory) => {
          fs.mkdirSync(directory, { recursive: true });
          const videoPath = path.join(directory, 'clip.mp4');
          fs.writeFileSync(videoPath, 'fake video');
          return videoPath;
        }),
        fetchText: vi.fn<MediaFetcher['fetchText']>(async () => '1\n00:00:01,000 --> 00:00:02,000\nFrom a URL'),
      },
      video: {
        getResolution: vi.fn<VideoMetadataProbe['getResolution']>(async () => ({ width: 1920, height: 1080 })),
        probeDuration: vi.fn<VideoMetadataProbe['probeDuration']>(async () => 8),
      },
      transcriber: { transcribe: vi.fn<Transcriber['transcribe']>(async () => spoken) },
      snapshot: vi.fn<() => Promise<FontSet>>(async () => new FontSet(['Arial', 'Roboto'])),
    };
    pipeline = build();

    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should pass ASS captions through with the exclusion filter applied', async () => {
    const request: CaptionRequest = {
      videoUrl: VIDEO_URL,
      captions: assInput,
      excludeTimeRanges: [{ start: '2', end: '3' }],
    };

    const result = await pipeline.run(request, 'ass-job');

    expect(result).toEqual({ outputPath: path.resolve(outputsDir, 'ass-job.ass'), kind: 'ass' });
    expect(fs.readFileSync(path.join(outputsDir, 'ass-job.ass'), 'utf-8')).toBe(
      [
        '[Script Info]',
        'ScriptType: v4.00+',
        '',
        '[Events]',
        'Dialogue: 0,0:00:05.00,0:00:06.00,Default,,0,0,0,,keep me',
      ].join('\n')
    );
    expect(fakes.media.downloadFile).not.toHaveBeenCalled();
  });

  it('should show plain text for the whole video at the given resolution', async () => {
    const result = await pipeline.run(
      { videoUrl: VIDEO_URL, captions: 'Hello world', playResX: 1920, playResY: 1080 },
      'plain'
    );

    expect(result).toEqual({ outputPath: path.resolve(outputsDir, 'plain.ass'), kind: 'ass' });
    const lines = fs.readFileSync(path.join(outputsDir, 'plain.ass'), 'utf-8').split('\n');
    expect(lines).toContain('PlayResX: 1920');
    expect(lines[lines.length - 2]).toBe(`Dialogue: 0,0:00:00.00,0:00:08.00,Default,,0,0,0,,${POS}Hello world`);
    expect(fakes.media.downloadFile).toHaveBeenCalledTimes(1);
    expect(fakes.video.getResolution).not.toHaveBeenCalled();
  });

  it('should transcribe the video when no captions are given', async () => {
    const result = await pipeline.run(
      { videoUrl: VIDEO_URL, settings: { style: 'word_by_word', 'all-caps': true } },
      'spoken'
    );

    expect(result).toEqual({ outputPath: path.resolve(outputsDir, 'spoken.ass'), kind: 'ass' });
    const content = fs.readFileSync(path.join(outputsDir, 'spoken.ass'), 'utf-8');
    expect(content.endsWith(
      String.raw`Dialogue: 0,0:00:00.50,0:00:01.00,Default,,0,0,0,,{\an5\pos(960,540)}{\c&H0000FFFF}HI` +
        '\n' +
        String.raw`Dialogue: 0,0:00:01.00,0:00:01.50,Default,,0,0,0,,{\an5\pos(960,540)}{\c&H0000FFFF}THERE` +
        '\n'
    )).toBe(true);
    expect(fakes.transcriber.transcribe).toHaveBeenCalledWith(path.join(tmpDir, 'work', 'spoken', 'clip.mp4'), {
      language: 'auto',
    });
    expect(fakes.media.downloadFile).toHaveBeenCalledTimes(1);
  });

  it('should remove the working directory afterwards', async () => {
    await pipeline.run({ videoUrl: VIDEO_URL, language: 'fr' }, 'cleanup');

    expect(fakes.transcriber.transcribe.mock.calls[0]?.[1]).toEqual({ language: 'fr' });
    expect(fs.existsSync(store.getWorkDir('cleanup'))).toBe(false);
  });

  it('should download caption URLs before classifying them', async () => {
    const result = await pipeline.run(
      { videoUrl: VIDEO_URL, captions: 'https://example.com/subs.srt', playResX: 640, playResY: 360 },
      'remote'
    );

    expect(fakes.media.fetchText).toHaveBeenCalledWith('https://example.com/subs.srt');
    expect(result).toEqual({ outputPath: path.resolve(outputsDir, 'remote.ass'), kind: 'ass' });
    expect(fakes.media.downloadFile).not.toHaveBeenCalled();
  });

  it('should report a missing font with the available fonts', async () => {
    const result = await pipeline.run(
      { videoUrl: VIDEO_URL, settings: { font_family: 'Papyrus' } },
      'font'
    );

    expect(result).toEqual({
      error: "Font 'Papyrus' not available.",
      availableFonts: ['Arial', 'Roboto'],
      statusCode: 400,
    });
    expect(fakes.media.downloadFile).not.toHaveBeenCalled();
    expect(outputFiles()).toEqual([]);
  });

  it('should reject non-classic styles for SRT captions', async () => {
    const result = await pipeline.run(
      {
        videoUrl: VIDEO_URL,
        captions: '1\n00:00:01,000 --> 00:00:02,000\nHi',
        settings: { style: 'karaoke' },
      },
      'srt'
    );

    expect(result).toEqual({ error: "Only 'classic' style is supported for SRT captions.", statusCode: 400 });
    expect(outputFiles()).toEqual([]);
  });

  it('should validate exclude ranges before any other work', async () => {
    const result = await pipeline.run(
      { videoUrl: VIDEO_URL, excludeTimeRanges: [{ start: '4', end: '1' }] },
      'ranges'
    );

    expect(result).toEqual({ error: 'Exclude range 4-1 must end after it starts.', statusCode: 400 });
    expect(fakes.snapshot).not.toHaveBeenCalled();
  });

  it('should reject a job id that escapes the work directory without touching the disk', async () => {
    const sibling = path.join(tmpDir, 'precious');
    fs.mkdirSync(sibling);
    fs.writeFileSync(path.join(sibling, 'keep.txt'), 'keep');

    const invalidRequest = await pipeline.run({ videoUrl: 'not a url' }, '../precious');
    const validRequest = await pipeline.run({ videoUrl: VIDEO_URL, captions: assInput }, '../precious');

    const failure = { error: "Invalid job id '../precious'. Use letters, digits, '-' or '_'.", statusCode: 400 };
    expect(invalidRequest).toEqual(failure);
    expect(validRequest).toEqual(failure);
    expect(fs.readFileSync(path.join(sibling, 'keep.txt'), 'utf-8')).toBe('keep');
    expect(fs.existsSync(path.join(tmpDir, 'precious.ass'))).toBe(false);
    expect(fakes.snapshot).not.toHaveBeenCalled();
  });

  it('should reject a settings value that is not an object', async () => {
    const result = await pipeline.run({ videoUrl: VIDEO_URL, settings: 'bold' }, 'settings');
    expect(result).toEqual({ error: "'settings' should be a dictionary.", statusCode: 400 });
  });

  it('should surface retrieval failures without fonts', async () => {
    fakes.media.downloadFile.mockRejectedValue(
      new SourceRetrievalError('Failed to download file from https://example.com/clip.mp4: HTTP 404 Not Found')
    );

    const result = await pipeline.run({ videoUrl: VIDEO_URL }, 'missing');

    expect(result).toEqual({
      error: 'Failed to download file from https://example.com/clip.mp4: HTTP 404 Not Found',
      statusCode: 502,
    });
    expect(outputFiles()).toEqual([]);
  });

  it('should report persistence failures', async () => {
    const blocked = path.join(tmpDir, 'not-a-directory');
    fs.writeFileSync(blocked, '');
    const result = await build({ outputsDir: blocked }).run({ videoUrl: VIDEO_URL, captions: assInput }, 'disk');

    expect('error' in result && result.error).toMatch(/^Failed to save subtitle file: /);
  });

  it('should record the outcome of a stored job', async () => {
    await store.create({ videoUrl: VIDEO_URL, captions: assInput }, 'stored');
    await store.create({ videoUrl: VIDEO_URL, settings: { font_family: 'Papyrus' } }, 'stored-font');

    await pipeline.runJob('stored');
    await pipeline.runJob('stored-font');

    const completed = await store.get('stored');
    expect(completed?.status).toBe('completed');
    expect(completed?.outputPath).toBe(path.resolve(outputsDir, 'stored.ass'));

    const failed = await store.get('stored-font');
    expect(failed?.status).toBe('failed');
    expect(failed?.availableFonts).toEqual(['Arial', 'Roboto']);
  });
});
