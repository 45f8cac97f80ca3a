/**
 * @module mask-blend
 * Blending a mask layer over an image.
 *
 * Painted pixels (alpha 255) show the mask color solid so the mask reads as
 * "painted"; soft-edged masks authored elsewhere (0 < alpha < 255) blend
 * linearly; unpainted pixels show the image.
 */

import type { PixelBuffer, Rect } from '@maskpaint/types';
import { BYTES_PER_PIXEL, clonePixelBuffer, createPixelBuffer } from './pixel-buffer';

/**
 * Blend `image` and `mask` into `out` over `region`. Output alpha is always 255.
 * All three buffers must share dimensions and `region` must lie inside them.
 */
export function blendMaskRegion(image: PixelBuffer, mask: PixelBuffer, out: PixelBuffer, region: Rect): void {
  const img = image.data;
  const msk = mask.data;
  const dst = out.data;
  const x1 = region.x + region.width;
  const y1 = region.y + region.height;

  for (let y = region.y; y < y1; y++) {
    let i = (y * image.width + region.x) * BYTES_PER_PIXEL;
    for (let x = region.x; x < x1; x++) {
      const a = msk[i + 3];
      if (a === 255) {
        dst[i] = msk[i];
        dst[i + 1] = msk[i + 1];
        dst[i + 2] = msk[i + 2];
      } else if (a > 0) {
        const t = a / 255;
        dst[i] = Math.round(msk[i] * t + img[i] * (1 - t));
        dst[i + 1] = Math.round(msk[i + 1] * t + img[i + 1] * (1 - t));
        dst[i + 2] = Math.round(msk[i + 2] * t + img[i + 2] * (1 - t));
      } else {
        dst[i] = img[i];
        dst[i + 1] = img[i + 1];
        dst[i + 2] = img[i + 2];
      }
      dst[i + 3] = 255;
      i += BYTES_PER_PIXEL;
    }
  }
}

/**
 * The image with the mask overlaid, at the image's resolution.
 *
 * Unlike the display composite, unmasked pixels keep their original alpha;
 * only masked pixels become opaque.
 *
 * @throws RangeError when the sizes differ.
 */
export function applyMaskOverlay(image: PixelBuffer, mask: PixelBuffer): PixelBuffer {
  if (image.width !== mask.width || image.height !== mask.height) {
    throw new RangeError(
      `Mask ${mask.width}x${mask.height} does not match image ${image.width}x${image.height}`,
    );
  }
  const result = clonePixelBuffer(image);
  const blended = createPixelBuffer(image.width, image.height);
  blendMaskRegion(image, mask, blended, { x: 0, y: 0, width: image.width, height: image.height });

  const msk = mask.data;
  for (let i = 0; i < msk.length; i += BYTES_PER_PIXEL) {
    if (msk[i + 3] === 0) continue;
    result.data[i] = blended.data[i];
    result.data[i + 1] = blended.data[i + 1];
    result.data[i + 2] = blended.data[i + 2];
    result.data[i + 3] = 255;
  }
  return result;
}
