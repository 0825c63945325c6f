/**
 * PNG output for decoded rasters.
 */
import sharp from 'sharp';
import type { Raster } from './types/raster.js';

/**
 * Writes a decoded raster somewhere. The pipeline takes one so tests can observe rasters
 * without encoding them.
 */
export type RasterEncoder = (raster: Raster, outputPath: string) => Promise<void>;

export const writePng: RasterEncoder = async (raster: Raster, outputPath: string): Promise<void> => {
  await sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: raster.channels },
  })
    .png()
    .toFile(outputPath);
};
