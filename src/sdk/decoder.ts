import { IMAGE_HEADER_SIZE, LABEL_HEADER_SIZE, PIXEL_MAX } from '../constants';
import { DecodeError } from '../errors';
import { ImageHeader } from '../client/types';

/**
 * Decode an IDX1 label stream. The 8-byte header is skipped without being read;
 * every remaining byte is one label.
 */
export function decodeLabels(bytes: Uint8Array): Uint8Array {
  if (bytes.length < LABEL_HEADER_SIZE) {
    throw new DecodeError(`Label data too short: ${bytes.length} bytes, header needs ${LABEL_HEADER_SIZE}`);
  }
  return new Uint8Array(bytes.subarray(LABEL_HEADER_SIZE));
}

export function readImageHeader(bytes: Uint8Array): ImageHeader {
  if (bytes.length < IMAGE_HEADER_SIZE) {
    throw new DecodeError(`Image data too short: ${bytes.length} bytes, header needs ${IMAGE_HEADER_SIZE}`);
  }
  // Buffers may be views into a shared pool, so honour byteOffset
  const view = new DataView(bytes.buffer, bytes.byteOffset, IMAGE_HEADER_SIZE);
  return {
    magic: view.getUint32(0, false),
    count: view.getUint32(4, false),
    rows: view.getUint32(8, false),
    cols: view.getUint32(12, false),
  };
}

/**
 * Decode an IDX3 image stream into one Float32Array per image, each pixel scaled to [0, 1].
 * @throws DecodeError if the data holds fewer than `count` full images
 */
export function decodeImages(bytes: Uint8Array): Float32Array[] {
  const { count, rows, cols } = readImageHeader(bytes);
  const imageSize = rows * cols;
  const expected = IMAGE_HEADER_SIZE + count * imageSize;

  if (bytes.length < expected) {
    throw new DecodeError(
      `Image data truncated: header declares ${count} images of ${rows}x${cols} ` +
      `(${expected} bytes) but only ${bytes.length} bytes are present`
    );
  }

  const images: Float32Array[] = new Array(count);
  for (let i = 0; i < count; i++) {
    const start = IMAGE_HEADER_SIZE + i * imageSize;
    const image = new Float32Array(imageSize);
    for (let p = 0; p < imageSize; p++) {
      image[p] = bytes[start + p] / PIXEL_MAX;
    }
    images[i] = image;
  }
  return images;
}
