import { config } from '../config';
import { CommandRunner, runCommand } from '../utils/process';
import { VideoResolution } from '../captions/types';

/** Resolution assumed when a video cannot be probed */
export const DEFAULT_RESOLUTION: VideoResolution = { width: 384, height: 288 };

/**
 * Video metadata needed by the caption pipeline
 */
export interface VideoMetadataProbe {
  getResolution(videoPath: string): Promise<VideoResolution>;
  probeDuration(videoPath: string): Promise<number | null>;
}

interface ProbeStream {
  width?: unknown;
  height?: unknown;
}

function readStreams(output: string): ProbeStream[] {
  const parsed: unknown = JSON.parse(output);
  if (typeof parsed === 'object' && parsed !== null && 'streams' in parsed && Array.isArray(parsed.streams)) {
    return parsed.streams.filter(
      (stream: unknown): stream is ProbeStream => typeof stream === 'object' && stream !== null
    );
  }
  return [];
}

/**
 * FFmpeg/ffprobe wrapper for video metadata
 */
export class FFmpegProcessor implements VideoMetadataProbe {
  private ffmpegPath: string;
  private runner: CommandRunner;

  constructor(ffmpegPath?: string, runner: CommandRunner = runCommand) {
    this.ffmpegPath = ffmpegPath ?? (config.ffmpegPath || 'ffmpeg');
    this.runner = runner;
  }

  private get ffprobePath(): string {
    return this.ffmpegPath.replace(/ffmpeg(?=[^/\\]*$)/, 'ffprobe');
  }

  /**
   * Checks if FFmpeg is available in the system
   * @returns True if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    return (await this.getVersion()) !== null;
  }

  /**
   * Gets the FFmpeg version string
   * @returns Version string or null if not available
   */
  async getVersion(): Promise<string | null> {
    try {
      const output = await this.runner(this.ffmpegPath, ['-version']);
      const match = output.match(/ffmpeg version ([^\s]+)/);
      return match?.[1] ?? 'unknown';
    } catch {
      return null;
    }
  }

  /**
   * Gets the width and height of the first video stream
   * @param videoPath - Path to video file
   * @returns Resolution, or 384x288 when the video cannot be probed
   */
  async getResolution(videoPath: string): Promise<VideoResolution> {
    const args = [
      '-v',
      'error',
      '-select_streams',
      'v:0',
      '-show_entries',
      'stream=width,height',
      '-of',
      'json',
      videoPath,
    ];

    try {
      const output = await this.runner(this.ffprobePath, args);
      const stream = readStreams(output)[0];
      const width = Number(stream?.width);
      const height = Number(stream?.height);

      if (Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0) {
        console.info(`Video resolution determined: ${width}x${height}`);
        return { width, height };
      }

      console.warn(
        `No video streams found for ${videoPath}. ` +
          `Using default resolution ${DEFAULT_RESOLUTION.width}x${DEFAULT_RESOLUTION.height}.`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(
        `Error getting video resolution: ${message}. ` +
          `Using default resolution ${DEFAULT_RESOLUTION.width}x${DEFAULT_RESOLUTION.height}.`
      );
    }

    return { ...DEFAULT_RESOLUTION };
  }

  /**
   * Gets video duration in seconds
   * @param videoPath - Path to video file
   * @returns Duration in seconds
   */
  async getDuration(videoPath: string): Promise<number> {
    const args = [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      videoPath,
    ];

    const output = await this.runner(this.ffprobePath, args);
    const duration = parseFloat(output.trim());

    if (isNaN(duration)) {
      throw new Error(`Could not determine duration for ${videoPath}`);
    }

    return duration;
  }

  /**
   * Like getDuration, but logs and returns null instead of throwing
   */
  async probeDuration(videoPath: string): Promise<number | null> {
    try {
      return await this.getDuration(videoPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Could not determine video duration: ${message}`);
      return null;
    }
  }
}
