import dotenv from 'dotenv';

// .env must be loaded before any MNIST_* variable below is read
dotenv.config();

// Source configuration
export const MNIST_DATA_URL = 'https://raw.githubusercontent.com/fgnt/mnist/master';

export const TRAIN_IMAGES_FILE = 'train-images-idx3-ubyte.gz';
export const TRAIN_LABELS_FILE = 'train-labels-idx1-ubyte.gz';
export const TEST_IMAGES_FILE = 't10k-images-idx3-ubyte.gz';
export const TEST_LABELS_FILE = 't10k-labels-idx1-ubyte.gz';

export const MNIST_FILES = [
  TRAIN_IMAGES_FILE,
  TRAIN_LABELS_FILE,
  TEST_IMAGES_FILE,
  TEST_LABELS_FILE,
] as const;

// IDX layout
export const LABEL_HEADER_SIZE = 8;
export const IMAGE_HEADER_SIZE = 16;
export const PIXEL_MAX = 255;

// Printer
export const IMAGE_WIDTH = 28;
export const PIXEL_THRESHOLD = 0.5;

// Logging
export const envTrue = (v?: string | null) => /^(true|1)$/i.test(String(v ?? ''));
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Getters for lazy evaluation
export const isDebug = () => envTrue(process.env.MNIST_DEBUG);
export const configuredLogLevel = () => process.env.MNIST_LOG_LEVEL || 'info';

export enum Split {
  TRAIN = 'train',
  TEST = 't10k'
}

// Load states
export enum LoadState {
  UNLOADED = 'unloaded',
  FILES_ENSURED = 'files_ensured',
  TRAIN_LOADED = 'train_loaded',
  FULLY_LOADED = 'fully_loaded'
}
