import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { gzipSync } from 'zlib';
import { FileDownloader } from '../src/client/types';

export function labelsFile(labels: number[]): Buffer {
  const buffer = Buffer.alloc(8 + labels.length);
  buffer.writeUInt32BE(0x00000801, 0);
  buffer.writeUInt32BE(labels.length, 4);
  Buffer.from(labels).copy(buffer, 8);
  return buffer;
}

export function imagesFile(count: number, rows: number, cols: number, pixels: number[]): Buffer {
  const buffer = Buffer.alloc(16 + pixels.length);
  buffer.writeUInt32BE(0x00000803, 0);
  buffer.writeUInt32BE(count, 4);
  buffer.writeUInt32BE(rows, 8);
  buffer.writeUInt32BE(cols, 12);
  Buffer.from(pixels).copy(buffer, 16);
  return buffer;
}

export function makeTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'mnist-test-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Serves gzipped archives from memory and records every request. */
export class FakeDownloader implements FileDownloader {
  readonly requested: string[] = [];

  constructor(private readonly archives: Record<string, Buffer>) {}

  async download(filename: string, outPath: string): Promise<void> {
    this.requested.push(filename);
    const raw = this.archives[filename];
    if (!raw) {
      throw new Error(`no archive for ${filename}`);
    }
    writeFileSync(outPath, gzipSync(raw));
  }
}

// Two tiny splits: train has 3 images of 2x2, test has 1 image of 2x2
export function syntheticArchives(): Record<string, Buffer> {
  return {
    'train-images-idx3-ubyte.gz': imagesFile(3, 2, 2, [0, 255, 0, 255, 255, 255, 0, 0, 51, 102, 153, 204]),
    'train-labels-idx1-ubyte.gz': labelsFile([1, 7, 3]),
    't10k-images-idx3-ubyte.gz': imagesFile(1, 2, 2, [255, 0, 0, 255]),
    't10k-labels-idx1-ubyte.gz': labelsFile([4]),
  };
}
