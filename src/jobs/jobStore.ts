import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Job, JOB_STATUSES, JobListItem, JobStatus } from './types';
import { config } from '../config';
import { CaptionFailure, ValidationError } from '../captions/errors';
import { CaptionRequest } from '../captions/types';
import { isRecord } from '../utils/guards';

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && (JOB_STATUSES as readonly string[]).includes(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function readRequest(value: unknown): CaptionRequest | null {
  if (!isRecord(value) || typeof value.videoUrl !== 'string') {
    return null;
  }
  return {
    videoUrl: value.videoUrl,
    captions: optionalString(value.captions),
    settings: value.settings,
    replace: value.replace,
    excludeTimeRanges: value.excludeTimeRanges,
    language: optionalString(value.language),
    playResX: optionalNumber(value.playResX),
    playResY: optionalNumber(value.playResY),
  };
}

/**
 * Rebuilds a job from its JSON form, converting date strings back to Dates
 */
function readJob(value: unknown): Job | null {
  if (!isRecord(value) || typeof value.id !== 'string' || !isJobStatus(value.status)) {
    return null;
  }
  const request = readRequest(value.request);
  const createdAt = optionalString(value.createdAt);
  const updatedAt = optionalString(value.updatedAt);
  if (!request || !createdAt || !updatedAt) {
    return null;
  }

  const completedAt = optionalString(value.completedAt);
  const availableFonts = Array.isArray(value.availableFonts)
    ? value.availableFonts.filter((font: unknown): font is string => typeof font === 'string')
    : undefined;

  return {
    id: value.id,
    request,
    status: value.status,
    outputPath: optionalString(value.outputPath),
    createdAt: new Date(createdAt),
    updatedAt: new Date(updatedAt),
    completedAt: completedAt ? new Date(completedAt) : undefined,
    error: optionalString(value.error),
    availableFonts,
  };
}

/**
 * Simple file-based job store
 */
export class JobStore {
  private jobsDir: string;
  private workDir: string;

  constructor(jobsDir?: string, workDir?: string) {
    this.jobsDir = jobsDir ?? config.jobsDir;
    this.workDir = workDir ?? config.workDir;
    this.ensureDirectory();
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.jobsDir)) {
      fs.mkdirSync(this.jobsDir, { recursive: true });
    }
  }

  private getJobPath(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  /**
   * Checks that a caller supplied job ID is safe to use in file names
   */
  static isValidId(jobId: string): boolean {
    return JOB_ID_PATTERN.test(jobId);
  }

  static invalidIdMessage(jobId: string): string {
    return `Invalid job id '${jobId}'. Use letters, digits, '-' or '_'.`;
  }

  /**
   * Creates a new job
   * @param request - Caption request to store with the job
   * @param jobId - Caller supplied ID; a UUID is generated when omitted
   */
  async create(request: CaptionRequest, jobId: string = uuidv4()): Promise<Job> {
    if (!JobStore.isValidId(jobId)) {
      throw new ValidationError(JobStore.invalidIdMessage(jobId));
    }
    if (fs.existsSync(this.getJobPath(jobId))) {
      throw new ValidationError(`Job ${jobId} already exists`);
    }

    const now = new Date();
    const job: Job = {
      id: jobId,
      request,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
    };

    await this.save(job);
    return job;
  }

  /**
   * Gets a job by ID
   */
  async get(jobId: string): Promise<Job | null> {
    if (!JobStore.isValidId(jobId)) {
      return null;
    }

    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(jobPath, 'utf-8');
      const job = readJob(JSON.parse(content));
      if (!job) {
        console.error(`Job file ${jobPath} is malformed`);
      }
      return job;
    } catch (error) {
      console.error(`Failed to read job ${jobId}:`, error);
      return null;
    }
  }

  /**
   * Saves a job
   */
  async save(job: Job): Promise<void> {
    job.updatedAt = new Date();
    const jobPath = this.getJobPath(job.id);
    fs.writeFileSync(jobPath, JSON.stringify(job, null, 2), 'utf-8');
  }

  private async require(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Marks a job as started
   */
  async markRunning(jobId: string): Promise<void> {
    const job = await this.require(jobId);
    job.status = 'running';
    await this.save(job);
  }

  /**
   * Records the generated subtitle file
   */
  async markCompleted(jobId: string, outputPath: string): Promise<void> {
    const job = await this.require(jobId);
    job.status = 'completed';
    job.outputPath = outputPath;
    job.completedAt = new Date();
    await this.save(job);
  }

  /**
   * Sets job as failed with the structured pipeline error
   */
  async setFailed(jobId: string, failure: CaptionFailure): Promise<void> {
    const job = await this.require(jobId);
    job.status = 'failed';
    job.error = failure.error;
    job.availableFonts = failure.availableFonts;
    job.completedAt = new Date();
    await this.save(job);
  }

  /**
   * Lists all jobs
   */
  async list(): Promise<JobListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.jobsDir).filter((f) => f.endsWith('.json'));

    const jobs: JobListItem[] = [];

    for (const file of files) {
      const job = await this.get(file.replace(/\.json$/, ''));

      if (job) {
        jobs.push({
          id: job.id,
          videoUrl: job.request.videoUrl,
          status: job.status,
          createdAt: job.createdAt,
        });
      }
    }

    // Sort by creation date, newest first
    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a job, its working directory and its output file
   */
  async delete(jobId: string): Promise<boolean> {
    const job = await this.get(jobId);

    if (!job) {
      return false;
    }

    fs.unlinkSync(this.getJobPath(jobId));

    const workDir = this.getWorkDir(jobId);
    if (fs.existsSync(workDir)) {
      fs.rmSync(workDir, { recursive: true });
    }

    if (job.outputPath && fs.existsSync(job.outputPath)) {
      fs.unlinkSync(job.outputPath);
    }

    return true;
  }

  /**
   * Gets the working directory (downloaded media) for a job
   */
  getWorkDir(jobId: string): string {
    if (!JobStore.isValidId(jobId)) {
      throw new ValidationError(JobStore.invalidIdMessage(jobId));
    }
    return path.join(this.workDir, jobId);
  }
}
