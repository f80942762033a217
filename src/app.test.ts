import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import type { Mock } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Server } from 'http';
import { createApp } from './app';
import { FontCatalog } from './fonts/fontCatalog';
import { JobStore } from './jobs/jobStore';
import { CaptionPipeline } from './pipelines/captionPipeline';
import { CommandRunner } from './utils/process';

const VIDEO_URL = 'https://example.com/clip.mp4';
const ASS_CAPTIONS = '[Script Info]\nScriptType: v4.00+\n\n[Events]\nDialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,hi';

describe('HTTP API', () => {
  let tmpDir: string;
  let outputsDir: string;
  let server: Server;
  let http: AxiosInstance;
  let fcList: Mock<CommandRunner>;

  beforeAll(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'caption-api-'));
    outputsDir = path.join(tmpDir, 'outputs');
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    fcList = vi.fn<CommandRunner>(async () => 'Roboto\n');
    const fonts = new FontCatalog({ customFontsDir: path.join(tmpDir, 'fonts'), runCommand: fcList });
    const store = new JobStore(path.join(tmpDir, 'jobs'), path.join(tmpDir, 'work'));
    const pipeline = new CaptionPipeline({
      fonts,
      store,
      outputsDir,
      video: {
        getResolution: async () => ({ width: 1280, height: 720 }),
        probeDuration: async () => 5,
      },
      transcriber: { transcribe: async () => ({ segments: [] }) },
      media: {
        downloadFile: async () => {
          throw new Error('unexpected video download');
        },
        fetchText: async () => '',
      },
    });

    const app = createApp(
      {
        store,
        pipeline,
        fonts,
        ffmpeg: { getVersion: async () => '6.0' },
        transcriptionConfigured: false,
      },
      outputsDir
    );

    server = app.listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should report health', async () => {
    const response = await http.get('/api/health');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      status: 'degraded',
      services: {
        ffmpeg: { available: true, version: '6.0' },
        fonts: { count: 1 },
        transcription: { configured: false },
      },
    });
  });

  it('should list and rescan fonts', async () => {
    expect((await http.get('/api/fonts')).data).toEqual({ fonts: ['Roboto'] });

    const callsBefore = fcList.mock.calls.length;
    expect((await http.post('/api/fonts/refresh')).data).toEqual({ fonts: ['Roboto'] });
    expect(fcList.mock.calls.length).toBe(callsBefore + 1);
  });

  it('should generate captions and serve the file', async () => {
    const response = await http.post('/api/captions', {
      id: 'api-job',
      video_url: VIDEO_URL,
      captions: ASS_CAPTIONS,
      settings: { font_family: 'Roboto' },
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      jobId: 'api-job',
      outputPath: path.resolve(outputsDir, 'api-job.ass'),
      downloadUrl: '/outputs/api-job.ass',
    });

    const served = await http.get('/outputs/api-job.ass', { responseType: 'text' });
    expect(served.data).toBe(ASS_CAPTIONS);

    const download = await http.get('/api/captions/api-job/download', { responseType: 'text' });
    expect(download.status).toBe(200);
    expect(download.data).toBe(ASS_CAPTIONS);

    const job = await http.get('/api/captions/api-job');
    expect(job.data.job.status).toBe('completed');
  });

  it('should return the font list when the font is missing', async () => {
    const response = await http.post('/api/captions', {
      id: 'font-job',
      video_url: VIDEO_URL,
      captions: ASS_CAPTIONS,
      settings: { font_family: 'Papyrus' },
    });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      jobId: 'font-job',
      error: "Font 'Papyrus' not available.",
      availableFonts: ['Roboto'],
    });
  });

  it('should reject a request without video_url', async () => {
    const response = await http.post('/api/captions', { captions: 'hello' });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ error: "'video_url' is required." });
  });

  it('should accept an uploaded caption file', async () => {
    const form = new FormData();
    form.append('captions', new Blob(['1\n00:00:01,000 --> 00:00:02,000\nUploaded']), 'subs.srt');
    form.append(
      'payload',
      JSON.stringify({
        id: 'upload-job',
        video_url: VIDEO_URL,
        settings: { font_family: 'Roboto' },
        PlayResX: 640,
        PlayResY: 360,
      })
    );

    const response = await http.post('/api/captions/upload', form);

    expect(response.status).toBe(200);
    expect(response.data.jobId).toBe('upload-job');
    const content = fs.readFileSync(path.join(outputsDir, 'upload-job.ass'), 'utf-8');
    expect(content.endsWith(
      'Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,' + String.raw`{\an5\pos(320,180)}Uploaded` + '\n'
    )).toBe(true);
  });

  it('should reject unsupported upload types', async () => {
    const form = new FormData();
    form.append('captions', new Blob(['data']), 'subs.pdf');

    const response = await http.post('/api/captions/upload', form);

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ error: 'Unsupported file type: .pdf' });
  });

  it('should delete jobs and 404 afterwards', async () => {
    expect((await http.delete('/api/captions/api-job')).data).toEqual({ success: true });
    expect((await http.get('/api/captions/api-job')).status).toBe(404);
    expect(fs.existsSync(path.join(outputsDir, 'api-job.ass'))).toBe(false);
  });

  it('should answer unknown routes with 404', async () => {
    const response = await http.get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: 'Not found' });
  });
});
