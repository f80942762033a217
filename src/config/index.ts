import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // OpenAI (speech-to-text)
  openaiApiKey: string;
  openaiApiBase: string;
  transcriptionModel: string;

  // File paths
  dataDir: string;
  outputsDir: string;
  workDir: string;
  jobsDir: string;
  customFontsDir: string;

  // Processing
  ffmpegPath: string;
  fontQueryTimeoutMs: number;
  downloadTimeoutMs: number;
  maxCaptionFileSize: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // OpenAI
    openaiApiKey: getEnvString('OPENAI_API_KEY'),
    openaiApiBase: getEnvString('OPENAI_API_BASE', 'https://api.openai.com/v1'),
    transcriptionModel: getEnvString('TRANSCRIPTION_MODEL', 'whisper-1'),

    // File paths
    dataDir,
    outputsDir: getEnvString('OUTPUTS_DIR', `${dataDir}/outputs`),
    workDir: getEnvString('WORK_DIR', `${dataDir}/work`),
    jobsDir: getEnvString('JOBS_DIR', `${dataDir}/jobs`),
    customFontsDir: getEnvString('CUSTOM_FONTS_DIR', './fonts'),

    // Processing
    ffmpegPath: getEnvString('FFMPEG_PATH', ''),
    fontQueryTimeoutMs: getEnvNumber('FONT_QUERY_TIMEOUT_MS', 2000),
    downloadTimeoutMs: getEnvNumber('DOWNLOAD_TIMEOUT_MS', 120000),
    maxCaptionFileSize: getEnvNumber('MAX_CAPTION_FILE_SIZE', 10485760), // 10MB
  };
}

export const config = loadConfig();
