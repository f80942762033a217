import { CaptionRequest } from '../captions/types';

/**
 * Possible job status values
 */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'completed', 'failed'];

/**
 * Complete job definition
 */
export interface Job {
  id: string;
  request: CaptionRequest;
  status: JobStatus;

  // Output file path, set once completed
  outputPath?: string;

  // Metadata
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
  availableFonts?: string[];
}

/**
 * Job list response
 */
export interface JobListItem {
  id: string;
  videoUrl: string;
  status: JobStatus;
  createdAt: Date;
}
