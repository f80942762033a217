import fs from 'fs';
import { createApp } from './app';
import { config } from './config';
import { FontCatalog } from './fonts';
import { JobStore } from './jobs';
import { MediaDownloader } from './media';
import { CaptionPipeline } from './pipelines';
import { OpenAITranscriber, isTranscriptionConfigured } from './transcription';
import { FFmpegProcessor } from './video';

// Ensure data directories exist
const dirs = [config.dataDir, config.outputsDir, config.workDir, config.jobsDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const store = new JobStore();
const fonts = new FontCatalog();
const ffmpeg = new FFmpegProcessor();

const pipeline = new CaptionPipeline({
  fonts,
  video: ffmpeg,
  transcriber: new OpenAITranscriber(),
  media: new MediaDownloader(),
  store,
});

const app = createApp({
  store,
  pipeline,
  fonts,
  ffmpeg,
  transcriptionConfigured: isTranscriptionConfigured(),
});

// Start server
const port = config.port;

async function start(): Promise<void> {
  const fontSet = await fonts.refresh();
  const ffmpegAvailable = await ffmpeg.isAvailable();

  app.listen(port, () => {
    console.info(`\nASS Caption Service`);
    console.info(`   Server running on http://localhost:${port}`);
    console.info(`   Environment: ${config.nodeEnv}`);
    console.info(`   Fonts available: ${fontSet.availableFontNames().length}`);
    console.info(`   FFmpeg: ${ffmpegAvailable ? 'available' : 'NOT FOUND'}`);
    console.info(`\n   API Endpoints:`);
    console.info(`   - GET    /api/health                - Check service status`);
    console.info(`   - GET    /api/fonts                 - List available fonts`);
    console.info(`   - POST   /api/fonts/refresh         - Rescan fonts`);
    console.info(`   - POST   /api/captions              - Generate ASS captions`);
    console.info(`   - POST   /api/captions/upload       - Generate from an uploaded caption file`);
    console.info(`   - GET    /api/captions              - List caption jobs`);
    console.info(`   - GET    /api/captions/:id          - Get job details`);
    console.info(`   - GET    /api/captions/:id/download - Download the subtitle file`);
    console.info(`   - DELETE /api/captions/:id          - Delete a job`);
    console.info(`\n`);
  });
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
