import type { AxiosInstance } from 'axios';

/** Anything able to fetch one archive by name into a local path. */
export interface FileDownloader {
  download(filename: string, outPath: string): Promise<void>;
}

export interface MnistReaderOptions {
  /** Base URL the archives are fetched from; falls back to MNIST_URL, then the public mirror. */
  mnistUrl?: string;
  /**
   * Debug logging on or off; falls back to MNIST_DEBUG, then MNIST_LOG_LEVEL decides.
   * The logger is shared, so this sets the level for the whole process.
   */
  debug?: boolean;
  /** Replaces the HTTP downloader, e.g. with a local mirror. */
  downloader?: FileDownloader;
}

export interface HttpClientParams {
  baseUrl: string;
  axiosInstance?: AxiosInstance;
}

export interface EnsuredFile {
  filename: string;
  path: string;
  cached: boolean;
}

export interface ImageHeader {
  magic: number;
  count: number;
  rows: number;
  cols: number;
}

export interface SplitData {
  labels: Uint8Array;
  images: Float32Array[];
}
