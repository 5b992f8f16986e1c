import type { AxiosInstance } from 'axios';
import path from 'path';
import { LoadState, Split } from '../constants';
import { DecodeError } from '../errors';
import { HttpClient } from '../client/httpClient';
import { EnsuredFile, FileDownloader, MnistReaderOptions, SplitData } from '../client/types';
import { debug, info, setLogLevel } from '../utils/logger';
import { resolveReaderConfig } from './config';
import { decodeImages, decodeLabels } from './decoder';
import { readGzip } from './decompress';
import { ensureFiles } from './fetcher';

/**
 * Downloads the MNIST archives into saveDir (once) and decodes them into memory.
 *
 * ```ts
 * const mnist = new MnistReader('mnist-data');
 * await mnist.load();
 * printImage(mnist.trainData[0]);
 * ```
 */
export class MnistReader {
  public trainLabels: Uint8Array = new Uint8Array(0);
  public trainData: Float32Array[] = [];
  public testLabels: Uint8Array = new Uint8Array(0);
  public testData: Float32Array[] = [];

  public readonly mnistUrl: string;
  public readonly saveDir: string;

  private readonly downloader: FileDownloader;
  private loadState: LoadState = LoadState.UNLOADED;

  constructor(saveDir: string, options: MnistReaderOptions = {}) {
    const config = resolveReaderConfig(saveDir, options);
    setLogLevel(config.logLevel);
    this.saveDir = config.saveDir;
    this.mnistUrl = config.mnistUrl;
    this.downloader = options.downloader ?? new HttpClient({ baseUrl: this.mnistUrl });
  }

  get state(): LoadState {
    return this.loadState;
  }

  /**
   * Download any missing archives from mnistUrl into saveDir over HTTP.
   * Always goes through an HttpClient; pass axiosInstance to customise the transport.
   */
  static async downloadFiles(saveDir: string, mnistUrl: string, axiosInstance?: AxiosInstance): Promise<EnsuredFile[]> {
    return ensureFiles(saveDir, new HttpClient({ baseUrl: mnistUrl, axiosInstance }));
  }

  /**
   * Fetch missing archives, then decode the train and test splits.
   * A failure leaves whatever was loaded before it in place.
   */
  async load(): Promise<void> {
    await ensureFiles(this.saveDir, this.downloader);
    this.loadState = LoadState.FILES_ENSURED;

    await this.loadData(Split.TRAIN);
    this.loadState = LoadState.TRAIN_LOADED;

    await this.loadData(Split.TEST);
    this.loadState = LoadState.FULLY_LOADED;

    info(`Loaded ${this.trainData.length} train and ${this.testData.length} test images`);
  }

  private async loadData(split: Split): Promise<void> {
    const { labels, images } = await readSplit(this.saveDir, split);
    if (split === Split.TRAIN) {
      this.trainLabels = labels;
      this.trainData = images;
    } else {
      this.testLabels = labels;
      this.testData = images;
    }
  }
}

/**
 * Decompress and decode one split's archive pair from saveDir.
 * @throws DecodeError when the label and image counts disagree
 */
export async function readSplit(saveDir: string, split: Split): Promise<SplitData> {
  const labelFile = path.join(saveDir, `${split}-labels-idx1-ubyte.gz`);
  const imageFile = path.join(saveDir, `${split}-images-idx3-ubyte.gz`);

  const labels = decodeLabels(await readGzip(labelFile));
  const images = decodeImages(await readGzip(imageFile));

  if (labels.length !== images.length) {
    throw new DecodeError(
      `${split} split has ${labels.length} labels but ${images.length} images`
    );
  }
  debug(`Decoded ${split} split: ${images.length} images`);
  return { labels, images };
}
