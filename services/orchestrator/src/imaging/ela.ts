import bmp from "bmp-js";
import jpeg from "jpeg-js";
import { PNG } from "pngjs";
import UTIF from "utif";

import { ELA } from "../thresholds.js";
import type { ImageFormat } from "./probe.js";

export interface RasterImage {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel. */
  data: Uint8Array;
}

export interface RegionError {
  row: number;
  col: number;
  mean: number;
}

export interface ErrorLevelStats {
  meanError: number;
  maxError: number;
  stdError: number;
  gridMean: number;
  regions: RegionError[];
}

function fromAbgr(abgr: Uint8Array): Uint8Array {
  const rgba = new Uint8Array(abgr.length);
  for (let i = 0; i < abgr.length; i += 4) {
    rgba[i] = abgr[i + 3];
    rgba[i + 1] = abgr[i + 2];
    rgba[i + 2] = abgr[i + 1];
    rgba[i + 3] = 255;
  }
  return rgba;
}

function decodeTiff(bytes: Buffer): RasterImage {
  const [page] = UTIF.decode(bytes);
  if (!page) {
    throw new Error("TIFF file has no image directory");
  }
  UTIF.decodeImage(bytes, page);
  const width = page.width ?? 0;
  const height = page.height ?? 0;
  if (width === 0 || height === 0) {
    throw new Error("TIFF image has no pixels");
  }
  return { width, height, data: UTIF.toRGBA8(page) };
}

export function decodeRaster(bytes: Buffer, format: ImageFormat): RasterImage {
  switch (format) {
    case "PNG": {
      const png = PNG.sync.read(bytes);
      return { width: png.width, height: png.height, data: png.data };
    }
    case "BMP": {
      // bmp-js lays pixels out as ABGR
      const bitmap = bmp.decode(bytes);
      return { width: bitmap.width, height: bitmap.height, data: fromAbgr(bitmap.data) };
    }
    case "TIFF":
      return decodeTiff(bytes);
    case "JPEG": {
      const decoded = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true });
      return { width: decoded.width, height: decoded.height, data: decoded.data };
    }
  }
}

function clampSample(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * Averages chroma over 2x2 blocks (JFIF YCbCr), the 4:2:0 subsampling a
 * default JPEG save applies. jpeg-js itself only encodes 4:4:4.
 */
export function subsampleChroma(image: RasterImage): RasterImage {
  const { width, height, data } = image;
  const out = new Uint8Array(data.length);

  for (let blockY = 0; blockY < height; blockY += 2) {
    for (let blockX = 0; blockX < width; blockX += 2) {
      const rows = Math.min(2, height - blockY);
      const cols = Math.min(2, width - blockX);
      let cb = 0;
      let cr = 0;
      for (let y = blockY; y < blockY + rows; y += 1) {
        for (let x = blockX; x < blockX + cols; x += 1) {
          const i = (y * width + x) * 4;
          cb += 128 - 0.168736 * data[i] - 0.331264 * data[i + 1] + 0.5 * data[i + 2];
          cr += 128 + 0.5 * data[i] - 0.418688 * data[i + 1] - 0.081312 * data[i + 2];
        }
      }
      cb = cb / (rows * cols) - 128;
      cr = cr / (rows * cols) - 128;

      for (let y = blockY; y < blockY + rows; y += 1) {
        for (let x = blockX; x < blockX + cols; x += 1) {
          const i = (y * width + x) * 4;
          const luma = 0.299 * data[i] + 0.587 * data[i + 1] + 0.114 * data[i + 2];
          out[i] = clampSample(luma + 1.402 * cr);
          out[i + 1] = clampSample(luma - 0.344136 * cb - 0.714136 * cr);
          out[i + 2] = clampSample(luma + 1.772 * cb);
          out[i + 3] = data[i + 3];
        }
      }
    }
  }

  return { width, height, data: out };
}

function resave(image: RasterImage, quality: number): RasterImage {
  const subsampled = subsampleChroma(image);
  const encoded = jpeg.encode({ width: image.width, height: image.height, data: subsampled.data }, quality);
  return decodeRaster(encoded.data, "JPEG");
}

/**
 * Error level analysis: resave at a fixed JPEG quality and measure how much
 * each RGB sample moves. Regions edited after the last save tend to move
 * more than their surroundings.
 */
export function errorLevelAnalysis(bytes: Buffer, format: ImageFormat): ErrorLevelStats {
  const original = decodeRaster(bytes, format);
  const resaved = resave(original, ELA.resaveQuality);
  const { width, height } = original;

  const grid = ELA.gridSize;
  const cellHeight = Math.floor(height / grid);
  const cellWidth = Math.floor(width / grid);
  const regionSums = new Float64Array(grid * grid);
  const regionCounts = new Float64Array(grid * grid);

  let sum = 0;
  let sumSquares = 0;
  let max = 0;

  for (let y = 0; y < height; y += 1) {
    const row = cellHeight > 0 ? Math.floor(y / cellHeight) : grid;
    for (let x = 0; x < width; x += 1) {
      const col = cellWidth > 0 ? Math.floor(x / cellWidth) : grid;
      const base = (y * width + x) * 4;
      let pixelSum = 0;
      for (let channel = 0; channel < 3; channel += 1) {
        const diff = Math.abs(original.data[base + channel] - resaved.data[base + channel]);
        pixelSum += diff;
        sumSquares += diff * diff;
        if (diff > max) max = diff;
      }
      sum += pixelSum;
      if (row < grid && col < grid) {
        regionSums[row * grid + col] += pixelSum;
        regionCounts[row * grid + col] += 3;
      }
    }
  }

  const samples = width * height * 3;
  const mean = samples > 0 ? sum / samples : 0;
  const variance = samples > 0 ? Math.max(0, sumSquares / samples - mean * mean) : 0;

  const regions: RegionError[] = [];
  if (cellHeight > 0 && cellWidth > 0) {
    for (let row = 0; row < grid; row += 1) {
      for (let col = 0; col < grid; col += 1) {
        const index = row * grid + col;
        regions.push({ row, col, mean: regionSums[index] / regionCounts[index] });
      }
    }
  }
  const gridMean = regions.length > 0
    ? regions.reduce((acc, region) => acc + region.mean, 0) / regions.length
    : 0;

  return {
    meanError: mean,
    maxError: max,
    stdError: Math.sqrt(variance),
    gridMean,
    regions,
  };
}
