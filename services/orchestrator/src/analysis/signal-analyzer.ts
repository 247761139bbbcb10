import { Injectable } from "@nestjs/common";

import { errorLevelAnalysis } from "../imaging/ela.js";
import type { ErrorLevelStats } from "../imaging/ela.js";
import { readExif } from "../imaging/exif.js";
import { bytesPerPixel, probeImage } from "../imaging/probe.js";
import type { ImageProbe } from "../imaging/probe.js";
import type { OpinionProvider } from "../providers/opinion-provider.js";
import {
  BASE_CONFIDENCE,
  COMPRESSION,
  EDITING_TOOLS,
  ELA,
  GENERATIVE_DIMENSIONS,
  MIN_CONFIDENCE,
  SEVERITY_PENALTY,
  UNDECODABLE_CONFIDENCE,
} from "../thresholds.js";
import type { Anomaly, AnomalyLocation, OpinionRecord, Severity } from "../types.js";

export const FORENSIC_SOURCE = "forensic_technical";

interface SubAnalysis {
  anomalies: Anomaly[];
  findings: Record<string, unknown>;
}

function anomaly(type: string, description: string, severity: Severity, location?: AnomalyLocation): Anomaly {
  return location ? { type, description, severity, location } : { type, description, severity };
}

function round(value: number, places: number): number {
  return Number(value.toFixed(places));
}

function populationStd(values: number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
  const variance = values.reduce((acc, value) => acc + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

function analyzeMetadata(bytes: Buffer, probe: ImageProbe): SubAnalysis {
  const exif = probe.exifOffset !== undefined ? readExif(bytes, probe.exifOffset) : null;
  const findings: Record<string, unknown> = {
    hasExif: exif !== null,
    exifTagCount: exif?.tagCount ?? 0,
  };
  const anomalies: Anomaly[] = [];

  if (!exif) {
    anomalies.push(anomaly(
      "metadata",
      "The file carries no EXIF metadata at all. Metadata may have been stripped intentionally to hide the image's origin.",
      "medium",
      { x: 90, y: 10 },
    ));
    return { anomalies, findings };
  }

  if (exif.software) {
    findings.software = exif.software;
    const software = exif.software.toLowerCase();
    if (EDITING_TOOLS.some((tool) => software.includes(tool))) {
      anomalies.push(anomaly(
        "editing_software",
        `Editing software found in metadata: ${exif.software}. The image has been processed.`,
        "medium",
        { x: 85, y: 8 },
      ));
    }
  }

  if (exif.dateTimeOriginal && exif.dateTime && exif.dateTimeOriginal !== exif.dateTime) {
    findings.dateOriginal = exif.dateTimeOriginal;
    findings.dateModified = exif.dateTime;
    anomalies.push(anomaly(
      "timestamps",
      `Capture time (${exif.dateTimeOriginal}) differs from last modification time (${exif.dateTime}).`,
      "high",
      { x: 80, y: 15 },
    ));
  }

  return { anomalies, findings };
}

function analyzeErrorLevels(bytes: Buffer, probe: ImageProbe): SubAnalysis {
  const anomalies: Anomaly[] = [];
  let stats: ErrorLevelStats;
  try {
    stats = errorLevelAnalysis(bytes, probe.format);
  } catch (error) {
    return { anomalies, findings: { error: (error as Error).message } };
  }

  for (const region of stats.regions) {
    if (region.mean > stats.gridMean * ELA.regionRatio && region.mean > ELA.regionFloor) {
      const ratio = (region.mean / stats.gridMean).toFixed(1);
      anomalies.push(anomaly(
        "ela_region",
        `Error level in region (${region.row + 1},${region.col + 1}) is ${ratio}x the image average, `
          + "which points to editing or pasting in this area.",
        "high",
        { x: region.col * 25 + 12, y: region.row * 25 + 12 },
      ));
    }
  }

  if (stats.stdError > ELA.globalStdLimit) {
    anomalies.push(anomaly(
      "ela_global",
      `High error level variance (${stats.stdError.toFixed(1)}): parts of the image have different compression histories.`,
      "medium",
      { x: 50, y: 50 },
    ));
  }

  return {
    anomalies,
    findings: {
      meanError: round(stats.meanError, 2),
      maxError: round(stats.maxError, 2),
      stdError: round(stats.stdError, 2),
      regionAnalysis: stats.regions.length > 0,
    },
  };
}

function analyzeCompression(bytes: Buffer, probe: ImageProbe): SubAnalysis {
  const anomalies: Anomaly[] = [];
  const findings: Record<string, unknown> = {
    format: probe.format,
    fileSizeBytes: bytes.length,
    mode: probe.mode,
  };
  const jpegInput = probe.format === "JPEG";

  if (jpegInput && probe.quantizationTables.length > 0) {
    findings.quantizationTables = probe.quantizationTables.length;
    const std = populationStd(probe.quantizationTables[0]);
    findings.quantizationStd = round(std, 2);
    if (std > COMPRESSION.quantStdLimit) {
      anomalies.push(anomaly(
        "double_compression",
        "Quantization tables show signs of double JPEG compression, which can indicate a resave after editing.",
        "medium",
        { x: 50, y: 85 },
      ));
    }
  }

  const ratio = bytesPerPixel(bytes.length, probe);
  findings.bytesPerPixel = round(ratio, 4);
  if (jpegInput && ratio < COMPRESSION.minBytesPerPixel) {
    anomalies.push(anomaly(
      "compression",
      `Unusually strong compression (${ratio.toFixed(3)} bytes/pixel); the image may have been saved repeatedly.`,
      "low",
      { x: 15, y: 90 },
    ));
  }

  return { anomalies, findings };
}

function analyzeDimensions(probe: ImageProbe): SubAnalysis {
  const { width, height } = probe;
  const anomalies: Anomaly[] = [];
  if (GENERATIVE_DIMENSIONS.some(([w, h]) => w === width && h === height)) {
    anomalies.push(anomaly(
      "dimensions",
      `Image size ${width}x${height} matches a typical output size of image generation models.`,
      "medium",
      { x: 10, y: 10 },
    ));
  }
  return {
    anomalies,
    findings: { width, height, megapixels: round((width * height) / 1e6, 2) },
  };
}

export function scoreAnomalies(anomalies: readonly Anomaly[]): number {
  if (anomalies.length === 0) {
    return BASE_CONFIDENCE;
  }
  const penalty = anomalies.reduce((acc, item) => acc + SEVERITY_PENALTY[item.severity], 0);
  return Math.max(MIN_CONFIDENCE, round(BASE_CONFIDENCE - penalty, 2));
}

/**
 * Deterministic manipulation signals from the raw bytes of an image.
 * Never throws: input that is not a readable JPEG, PNG, BMP or TIFF yields a neutral
 * opinion with a single `format` anomaly.
 */
export function analyzeSignals(bytes: Buffer, filename: string): OpinionRecord {
  const probe = probeImage(bytes);
  if (!probe) {
    return {
      sourceKind: FORENSIC_SOURCE,
      confidence: UNDECODABLE_CONFIDENCE,
      findings: { filename },
      anomalies: [anomaly("format", `Could not open ${filename || "the file"} as an image.`, "medium")],
    };
  }

  const metadata = analyzeMetadata(bytes, probe);
  const ela = analyzeErrorLevels(bytes, probe);
  const compression = analyzeCompression(bytes, probe);
  const dimensions = analyzeDimensions(probe);

  const anomalies = [
    ...metadata.anomalies,
    ...ela.anomalies,
    ...compression.anomalies,
    ...dimensions.anomalies,
  ];

  return {
    sourceKind: FORENSIC_SOURCE,
    confidence: scoreAnomalies(anomalies),
    findings: {
      exif: metadata.findings,
      ela: ela.findings,
      compression: compression.findings,
      dimensions: dimensions.findings,
    },
    anomalies,
  };
}

@Injectable()
export class SignalAnalyzer implements OpinionProvider {
  readonly kind = FORENSIC_SOURCE;

  async analyze(fileBytes: Buffer, filename: string): Promise<OpinionRecord> {
    return analyzeSignals(fileBytes, filename);
  }
}
