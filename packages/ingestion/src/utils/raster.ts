import type { BBox } from '@ledgerlens/model';

import sharp from 'sharp';

export interface RasterSize {
  width: number;
  height: number;
}

/**
 * Pixel rectangle in sharp's `extract` shape
 */
export interface PixelRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Pixels per PDF point at the given render resolution.
 */
export function pointScale(dpi: number): number {
  return dpi / 72;
}

/**
 * Map a bbox in points onto the raster, truncating to whole pixels and
 * clamping to the image. Width or height is 0 when nothing remains.
 */
export function toPixelRect(
  bbox: BBox,
  scale: number,
  size: RasterSize,
): PixelRect {
  const x0 = Math.max(0, Math.floor(bbox[0] * scale));
  const y0 = Math.max(0, Math.floor(bbox[1] * scale));
  const x1 = Math.min(size.width, Math.floor(bbox[2] * scale));
  const y1 = Math.min(size.height, Math.floor(bbox[3] * scale));
  return {
    left: x0,
    top: y0,
    width: Math.max(0, x1 - x0),
    height: Math.max(0, y1 - y0),
  };
}

export async function readRasterSize(raster: Buffer): Promise<RasterSize> {
  const { width, height } = await sharp(raster).metadata();
  if (!width || !height) {
    throw new Error('Raster has no readable dimensions');
  }
  return { width, height };
}

/**
 * Cut `rect` out of the raster and encode it as PNG.
 */
export async function cropPng(raster: Buffer, rect: PixelRect): Promise<Buffer> {
  return sharp(raster).extract(rect).png().toBuffer();
}
