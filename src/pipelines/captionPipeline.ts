import fs from 'fs';
import path from 'path';
import { JobStore } from '../jobs/jobStore';
import { assertFontAvailable } from '../captions/assHeader';
import { classifyCaptionSource, isUrl, resolveTranscription } from '../captions/captionSource';
import {
  CaptionFailure,
  PersistenceError,
  ValidationError,
  statusCodeFor,
  toCaptionFailure,
} from '../captions/errors';
import { filterSubtitleLines, normalizeExcludeRanges } from '../captions/exclusionFilter';
import { buildAssDocument } from '../captions/styleHandlers';
import { normalizeStyleOptions, parseReplaceRules } from '../captions/styleOptions';
import { CaptionRequest, SubtitleKind, VideoResolution } from '../captions/types';
import { FontSnapshot } from '../fonts/fontCatalog';
import { MediaFetcher } from '../media/download';
import { Transcriber } from '../transcription/openaiTranscriber';
import { VideoMetadataProbe } from '../video/ffmpeg';
import { config } from '../config';

/**
 * Generated subtitle file
 */
export interface CaptionSuccess {
  outputPath: string;
  kind: SubtitleKind;
}

/**
 * Structured failure plus the HTTP status it maps to
 */
export interface PipelineFailure extends CaptionFailure {
  statusCode: number;
}

export type CaptionResult = CaptionSuccess | PipelineFailure;

export function isCaptionFailure(result: CaptionResult): result is PipelineFailure {
  return 'error' in result;
}

/**
 * External collaborators of the caption pipeline
 */
export interface CaptionPipelineDeps {
  fonts: { snapshot(): Promise<FontSnapshot> };
  video: VideoMetadataProbe;
  transcriber: Transcriber;
  media: MediaFetcher;
  store: JobStore;
  outputsDir?: string;
}

/**
 * Downloads the request video at most once, on first use
 */
class LazyVideo {
  private download: Promise<string> | null = null;

  constructor(
    private readonly media: MediaFetcher,
    private readonly url: string,
    private readonly directory: string,
    private readonly logPrefix: string
  ) {}

  path(): Promise<string> {
    if (!this.download) {
      console.info(`${this.logPrefix}Downloading video ${this.url}`);
      this.download = this.media.downloadFile(this.url, this.directory);
    }
    return this.download;
  }
}

function validatePlayRes(request: CaptionRequest): VideoResolution | null {
  const { playResX, playResY } = request;
  if (playResX === undefined || playResY === undefined) {
    return null;
  }
  if (!Number.isInteger(playResX) || !Number.isInteger(playResY) || playResX <= 0 || playResY <= 0) {
    throw new ValidationError("'PlayResX' and 'PlayResY' must be positive integers.");
  }
  return { width: playResX, height: playResY };
}

/**
 * Main pipeline turning a caption request into an ASS file
 */
export class CaptionPipeline {
  private deps: CaptionPipelineDeps;
  private outputsDir: string;

  constructor(deps: CaptionPipelineDeps) {
    this.deps = deps;
    this.outputsDir = deps.outputsDir ?? config.outputsDir;
  }

  /**
   * Runs a stored job and records its outcome
   */
  async runJob(jobId: string): Promise<CaptionResult> {
    const { store } = this.deps;
    const job = await store.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }

    await store.markRunning(jobId);
    const result = await this.run(job.request, jobId);

    if (isCaptionFailure(result)) {
      await store.setFailed(jobId, { error: result.error, availableFonts: result.availableFonts });
    } else {
      await store.markCompleted(jobId, result.outputPath);
    }
    return result;
  }

  /**
   * Generates the subtitle file for a request. Every failure is returned as
   * a single CaptionFailure and leaves no output file behind.
   * @param request - Caption request
   * @param jobId - Names the output file and the working directory
   */
  async run(request: CaptionRequest, jobId: string): Promise<CaptionResult> {
    const logPrefix = `Job ${jobId}: `;

    // The id names paths on disk, so nothing is touched for an invalid one
    if (!JobStore.isValidId(jobId)) {
      const error = new ValidationError(JobStore.invalidIdMessage(jobId));
      console.error(`${logPrefix}${error.message}`);
      return { ...toCaptionFailure(error), statusCode: statusCodeFor(error) };
    }

    const workDir = this.deps.store.getWorkDir(jobId);

    try {
      // Stage 1: Validate the whole request before any work
      if (!isUrl(request.videoUrl)) {
        throw new ValidationError("'video_url' must be an http(s) URL.");
      }
      const ranges = normalizeExcludeRanges(request.excludeTimeRanges);
      const options = normalizeStyleOptions(request.settings ?? {}, logPrefix);
      const rules = parseReplaceRules(request.replace, logPrefix);
      const playRes = validatePlayRes(request);

      // Stage 2: Font availability
      const fonts = await this.deps.fonts.snapshot();
      assertFontAvailable(options.fontFamily, fonts);
      console.info(`${logPrefix}Font '${options.fontFamily}' is available.`);

      // Stage 3: Caption source
      const source = classifyCaptionSource(await this.loadCaptions(request.captions, logPrefix));
      let content: string;

      if (source.kind === 'ass') {
        console.info(`${logPrefix}Detected ASS formatted captions.`);
        content = source.content;
      } else {
        console.info(`${logPrefix}Caption source: ${source.kind}. Using style '${options.style}'.`);
        const video = new LazyVideo(this.deps.media, request.videoUrl, workDir, logPrefix);

        const transcription = await resolveTranscription(
          source,
          options.style,
          {
            probeDuration: async () => this.deps.video.probeDuration(await video.path()),
            transcribe: async (language) =>
              this.deps.transcriber.transcribe(await video.path(), { language }),
          },
          request.language ?? 'auto',
          logPrefix
        );

        const resolution = playRes ?? (await this.deps.video.getResolution(await video.path()));
        console.info(`${logPrefix}Using resolution ${resolution.width}x${resolution.height}`);

        content = buildAssDocument(transcription, options.style, options, rules, resolution, fonts, logPrefix);
      }

      // Stage 4: Exclusion filter
      if (ranges.length > 0) {
        content = filterSubtitleLines(content, ranges, 'ass');
        console.info(`${logPrefix}Filtered ASS Dialogue lines due to exclude_time_ranges.`);
      }

      // Stage 5: Persist
      const outputPath = this.writeOutput(jobId, 'ass', content);
      console.info(`${logPrefix}Subtitle file saved to ${outputPath}`);
      return { outputPath, kind: 'ass' };
    } catch (error) {
      const failure = toCaptionFailure(error);
      console.error(`${logPrefix}${failure.error}`);
      return { ...failure, statusCode: statusCodeFor(error) };
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }

  /**
   * Downloads caption URLs; other values are taken as raw content
   */
  private async loadCaptions(captions: string | undefined, logPrefix: string): Promise<string | undefined> {
    if (captions && isUrl(captions)) {
      console.info(`${logPrefix}Captions provided as URL. Downloading captions.`);
      return this.deps.media.fetchText(captions);
    }
    return captions;
  }

  /**
   * Writes to a temporary name and renames, so a failed write leaves no file
   */
  private writeOutput(jobId: string, kind: SubtitleKind, content: string): string {
    const outputPath = path.join(this.outputsDir, `${jobId}.${kind}`);
    const tempPath = `${outputPath}.tmp`;

    try {
      fs.mkdirSync(this.outputsDir, { recursive: true });
      fs.writeFileSync(tempPath, content, 'utf-8');
      fs.renameSync(tempPath, outputPath);
      return path.resolve(outputPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Failed to save subtitle file: ${message}`);
    }
  }
}
