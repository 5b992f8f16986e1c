import { mkdir, stat } from 'fs/promises';
import path from 'path';
import { MNIST_FILES } from '../constants';
import { FilesystemError, describeError, errorCode } from '../errors';
import { EnsuredFile, FileDownloader } from '../client/types';
import { info, error as logError } from '../utils/logger';

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return false;
    }
    throw new FilesystemError(`Failed to check ${filePath}: ${describeError(err)}`, filePath, err);
  }
}

/**
 * Make sure every archive is present under saveDir, downloading only the missing ones.
 * Presence is the whole cache check: a file that exists is never re-fetched or verified.
 */
export async function ensureFiles(saveDir: string, downloader: FileDownloader): Promise<EnsuredFile[]> {
  try {
    await mkdir(saveDir, { recursive: true });
  } catch (err) {
    throw new FilesystemError(`Failed to create ${saveDir}: ${describeError(err)}`, saveDir, err);
  }

  const results: EnsuredFile[] = [];
  for (const filename of MNIST_FILES) {
    const outPath = path.join(saveDir, filename);
    if (await fileExists(outPath)) {
      info(`File: ${filename}`);
      results.push({ filename, path: outPath, cached: true });
      continue;
    }

    info(`Downloading: ${filename}...`);
    try {
      await downloader.download(filename, outPath);
    } catch (err) {
      logError(`Failed to download ${filename}:`, err);
      throw err;
    }
    results.push({ filename, path: outPath, cached: false });
  }
  return results;
}
