import axios, { AxiosInstance } from 'axios';
import { createWriteStream } from 'fs';
import { rm } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { FilesystemError, TransportError, describeError } from '../errors';
import { logger } from '../utils/logger';
import { FileDownloader, HttpClientParams } from './types';

export class HttpClient implements FileDownloader {
  private readonly baseUrl: string;
  private readonly axios: AxiosInstance;

  constructor(params: HttpClientParams) {
    this.baseUrl = params.baseUrl.replace(/\/$/, '');
    this.axios = params.axiosInstance ?? HttpClient.createAxios();
    logger.debug(`HTTP client initialized at ${this.baseUrl}`);
  }

  private static createAxios(): AxiosInstance {
    const instance = axios.create();
    if (logger.level === 'debug') {
      instance.interceptors.request.use(request => {
        logger.debug(`HTTP Request: ${request.method?.toUpperCase()} ${request.url}`);
        return request;
      });
      instance.interceptors.response.use(response => {
        logger.debug(`HTTP Response: ${response.status} ${response.config.url}`);
        return response;
      });
    }
    return instance;
  }

  urlFor(filename: string): string {
    return `${this.baseUrl}/${filename}`;
  }

  /**
   * Stream `{baseUrl}/{filename}` into outPath.
   * Anything but a 200 is a failure; a partially written file is removed.
   */
  async download(filename: string, outPath: string): Promise<void> {
    const url = this.urlFor(filename);

    let body: Readable;
    try {
      const response = await this.axios.get<Readable>(url, {
        responseType: 'stream',
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        response.data.destroy();
        throw new TransportError(`Failed to download file: ${response.status}`, response.status);
      }
      body = response.data;
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(`Request for ${url} failed: ${describeError(err)}`, undefined, err);
    }

    // Whichever side errors first is the cause; pipeline then destroys the other with the same error
    const failure: { side?: 'body' | 'file' } = {};
    body.once('error', () => {
      failure.side ??= 'body';
    });
    const file = createWriteStream(outPath);
    file.once('error', () => {
      failure.side ??= 'file';
    });

    try {
      await pipeline(body, file);
    } catch (err) {
      if (!file.closed) {
        await new Promise<void>(resolve => file.once('close', () => resolve()));
      }
      await rm(outPath, { force: true });
      if (failure.side === 'file') {
        throw new FilesystemError(`Failed to write ${outPath}: ${describeError(err)}`, outPath, err);
      }
      throw new TransportError(`Download of ${url} interrupted: ${describeError(err)}`, undefined, err);
    }
  }
}
