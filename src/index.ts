// Reader
export { MnistReader, readSplit } from './sdk/reader';
export { resolveReaderConfig, type ReaderConfig } from './sdk/config';

// From fetch / decode pipeline
export { ensureFiles } from './sdk/fetcher';
export { readGzip, ungzip } from './sdk/decompress';
export { decodeLabels, decodeImages, readImageHeader } from './sdk/decoder';
export { renderImage, printImage } from './sdk/printer';

// Transport
export { HttpClient } from './client/httpClient';

export {
  MNIST_DATA_URL,
  MNIST_FILES,
  LoadState,
  Split
} from './constants';

export * from './errors';
export * from './client/types';
