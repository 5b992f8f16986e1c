import { createReadStream, createWriteStream } from 'fs';
import { readFile } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { promisify } from 'util';
import { createGunzip, gunzip } from 'zlib';
import { DecodeError, FilesystemError, describeError, errorCode } from '../errors';
import { debug } from '../utils/logger';

const gunzipAsync = promisify(gunzip);

// zlib reports stream corruption with Z_* codes; everything else came from fs
function isZlibError(err: unknown): boolean {
  return errorCode(err)?.startsWith('Z_') ?? false;
}

/**
 * Read a gzip file fully into memory.
 */
export async function readGzip(inPath: string): Promise<Buffer> {
  let compressed: Buffer;
  try {
    compressed = await readFile(inPath);
  } catch (err) {
    throw new FilesystemError(`Failed to read ${inPath}: ${describeError(err)}`, inPath, err);
  }

  try {
    const data = await gunzipAsync(compressed);
    debug(`Decompressed ${inPath}: ${compressed.length} -> ${data.length} bytes`);
    return data;
  } catch (err) {
    throw new DecodeError(`Malformed gzip stream in ${inPath}: ${describeError(err)}`, err);
  }
}

/**
 * Write a decompressed copy of inPath to outPath.
 */
export async function ungzip(inPath: string, outPath: string): Promise<void> {
  try {
    await pipeline(createReadStream(inPath), createGunzip(), createWriteStream(outPath));
  } catch (err) {
    if (isZlibError(err)) {
      throw new DecodeError(`Malformed gzip stream in ${inPath}: ${describeError(err)}`, err);
    }
    throw new FilesystemError(`Failed to ungzip ${inPath} to ${outPath}: ${describeError(err)}`, inPath, err);
  }
}
