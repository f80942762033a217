import { FontCatalog } from '../fonts/fontCatalog';
import { JobStore } from '../jobs/jobStore';
import { CaptionPipeline } from '../pipelines/captionPipeline';
import { FFmpegProcessor } from '../video/ffmpeg';

/**
 * Services shared by the API routers, built once at startup
 */
export interface ApiContext {
  store: JobStore;
  pipeline: CaptionPipeline;
  fonts: FontCatalog;
  ffmpeg: Pick<FFmpegProcessor, 'getVersion'>;
  transcriptionConfigured: boolean;
}
