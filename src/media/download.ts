import axios, { AxiosInstance } from 'axios';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { config } from '../config';
import { SourceRetrievalError } from '../captions/errors';

/**
 * Remote media retrieval used by the caption pipeline
 */
export interface MediaFetcher {
  downloadFile(url: string, directory: string): Promise<string>;
  fetchText(url: string): Promise<string>;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status} ${error.response.statusText}`.trim() : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Derives a safe local file name from the URL path
 */
export function fileNameFromUrl(url: string): string {
  const base = path.basename(new URL(url).pathname).replace(/[^\w.-]/g, '_');
  return base && base !== '.' && base !== '..' ? base : 'download';
}

/**
 * HTTP downloader backed by axios
 */
export class MediaDownloader implements MediaFetcher {
  private http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: config.downloadTimeoutMs });
  }

  /**
   * Streams a remote file into a directory
   * @param url - http(s) URL
   * @param directory - Target directory, created if missing
   * @returns Path of the downloaded file
   */
  async downloadFile(url: string, directory: string): Promise<string> {
    try {
      fs.mkdirSync(directory, { recursive: true });
      const filePath = path.join(directory, fileNameFromUrl(url));

      const response = await this.http.get<Readable>(url, { responseType: 'stream' });
      await pipeline(response.data, fs.createWriteStream(filePath));

      console.info(`Downloaded ${url} to ${filePath}`);
      return filePath;
    } catch (error) {
      throw new SourceRetrievalError(`Failed to download file from ${url}: ${describeError(error)}`);
    }
  }

  /**
   * Fetches a remote text document (caption files)
   */
  async fetchText(url: string): Promise<string> {
    try {
      const response = await this.http.get<string>(url, { responseType: 'text', transformResponse: (data) => data });
      if (typeof response.data !== 'string') {
        throw new Error('Response is not text');
      }
      return response.data;
    } catch (error) {
      throw new SourceRetrievalError(`Failed to download captions: ${describeError(error)}`);
    }
  }
}
