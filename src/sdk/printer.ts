import { IMAGE_WIDTH, PIXEL_THRESHOLD } from '../constants';

export function renderImage(image: ArrayLike<number>, width: number = IMAGE_WIDTH): string {
  let out = '';
  for (let start = 0; start < image.length; start += width) {
    const end = Math.min(start + width, image.length);
    for (let i = start; i < end; i++) {
      out += image[i] > PIXEL_THRESHOLD ? '*' : '_';
    }
    out += '\n';
  }
  return out;
}

/** Dump an image to stdout as `*` (ink) and `_` (background). */
export function printImage(image: ArrayLike<number>): void {
  process.stdout.write(renderImage(image));
}
