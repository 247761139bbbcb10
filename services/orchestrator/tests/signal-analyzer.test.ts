import { describe, expect, it } from "vitest";

import { SignalAnalyzer, analyzeSignals, scoreAnomalies } from "../src/analysis/signal-analyzer.js";
import { CritiqueEngine } from "../src/critique/critique.engine.js";
import { CritiqueHistory } from "../src/critique/critique.history.js";
import { errorLevelAnalysis, subsampleChroma } from "../src/imaging/ela.js";
import type { Anomaly } from "../src/types.js";
import {
  checkerboardRaster,
  commentSegment,
  encodeJpeg,
  encodePng,
  exifSegment,
  grayBmp,
  grayJpeg,
  grayPng,
  grayTiff,
  insertSegments,
  withExif,
  withFirstQuantizationTable,
} from "./helpers/images.js";

const DOUBLE_COMPRESSION_TABLE = [...Array<number>(32).fill(10), ...Array<number>(32).fill(70)];

function types(anomalies: readonly Anomaly[]): string[] {
  return anomalies.map((item) => item.type);
}

describe("analyzeSignals", () => {
  it("returns a neutral opinion for undecodable input", () => {
    const opinion = analyzeSignals(Buffer.from("definitely not an image"), "note.jpg");

    expect(opinion.sourceKind).toBe("forensic_technical");
    expect(opinion.confidence).toBe(0.5);
    expect(opinion.anomalies).toHaveLength(1);
    expect(opinion.anomalies[0]).toMatchObject({ type: "format", severity: "medium" });
  });

  it("flags a generator-sized JPEG with irregular quantization tables", () => {
    const base = grayJpeg(1024, 1024);
    const padded = insertSegments(base, [
      exifSegment({ make: "TestCam" }),
      commentSegment(60000),
      commentSegment(60000),
    ]);
    const bytes = withFirstQuantizationTable(padded, DOUBLE_COMPRESSION_TABLE);

    const opinion = analyzeSignals(bytes, "generated.jpg");

    expect(types(opinion.anomalies)).toEqual(["double_compression", "dimensions"]);
    expect(opinion.anomalies.map((item) => item.severity)).toEqual(["medium", "medium"]);
    expect(opinion.anomalies[0].location).toEqual({ x: 50, y: 85 });
    expect(opinion.anomalies[1].location).toEqual({ x: 10, y: 10 });
    expect(opinion.confidence).toBe(0.76);
    expect(opinion.findings.compression).toMatchObject({ format: "JPEG", quantizationStd: 30, quantizationTables: 2 });
    expect(opinion.findings.dimensions).toEqual({ width: 1024, height: 1024, megapixels: 1.05 });
    expect(opinion.findings.exif).toEqual({ hasExif: true, exifTagCount: 1 });
  });

  it("reports stripped metadata and heavy compression", () => {
    const opinion = analyzeSignals(grayJpeg(300, 200), "stripped.jpg");

    expect(types(opinion.anomalies)).toEqual(["metadata", "compression"]);
    expect(opinion.anomalies[0]).toMatchObject({ severity: "medium", location: { x: 90, y: 10 } });
    expect(opinion.anomalies[1]).toMatchObject({ severity: "low", location: { x: 15, y: 90 } });
    expect(opinion.confidence).toBe(0.81);
    expect(opinion.findings.exif).toEqual({ hasExif: false, exifTagCount: 0 });
  });

  it("reports editing software and mismatched timestamps", () => {
    const bytes = withExif(grayJpeg(300, 200), {
      make: "TestCam",
      software: "Adobe Photoshop 2024",
      dateTime: "2024:05:02 10:00:00",
      dateTimeOriginal: "2024:05:01 09:00:00",
    });

    const opinion = analyzeSignals(bytes, "edited.jpg");

    expect(types(opinion.anomalies)).toEqual(["editing_software", "timestamps", "compression"]);
    expect(opinion.anomalies[1].severity).toBe("high");
    expect(opinion.confidence).toBe(0.66);
    expect(opinion.findings.exif).toEqual({
      hasExif: true,
      exifTagCount: 5,
      software: "Adobe Photoshop 2024",
      dateOriginal: "2024:05:01 09:00:00",
      dateModified: "2024:05:02 10:00:00",
    });
  });

  it("ignores software that is not an editor and equal timestamps", () => {
    const bytes = withExif(grayJpeg(300, 200), {
      software: "Firmware 1.2",
      dateTime: "2024:05:01 09:00:00",
      dateTimeOriginal: "2024:05:01 09:00:00",
    });

    expect(types(analyzeSignals(bytes, "camera.jpg").anomalies)).toEqual(["compression"]);
  });

  it("analyzes PNG input without compression checks", () => {
    const opinion = analyzeSignals(grayPng(512, 512), "render.png");

    expect(types(opinion.anomalies)).toEqual(["metadata", "dimensions"]);
    expect(opinion.confidence).toBe(0.76);
    expect(opinion.findings.compression).toEqual({
      format: "PNG",
      fileSizeBytes: grayPng(512, 512).length,
      mode: "RGBA",
      bytesPerPixel: Number((grayPng(512, 512).length / (512 * 512)).toFixed(4)),
    });
  });

  it("analyzes BMP and TIFF input", () => {
    for (const [bytes, format] of [[grayBmp(300, 200), "BMP"], [grayTiff(300, 200), "TIFF"]] as const) {
      const opinion = analyzeSignals(bytes, "scan");

      expect(types(opinion.anomalies)).toEqual(["metadata"]);
      expect(opinion.confidence).toBe(0.84);
      expect(opinion.findings.compression).toMatchObject({ format });
      expect(opinion.findings.ela).toMatchObject({ regionAnalysis: true });
    }
  });

  it("flags regions whose error level stands out from the rest of the image", () => {
    const bytes = encodePng(checkerboardRaster(400, 400, { x: 200, y: 100, width: 200, height: 100 }));

    const opinion = analyzeSignals(bytes, "pasted.png");

    expect(types(opinion.anomalies)).toEqual(["metadata", "ela_region", "ela_region", "ela_global"]);
    expect(opinion.anomalies[1]).toMatchObject({ severity: "high", location: { x: 62, y: 37 } });
    expect(opinion.anomalies[1].description).toMatch(/^Error level in region \(2,3\) is \d+\.\dx the image average/);
    expect(opinion.anomalies[2]).toMatchObject({ severity: "high", location: { x: 87, y: 37 } });
    expect(opinion.anomalies[2].description).toMatch(/^Error level in region \(2,4\) is /);
    expect(opinion.anomalies[3]).toMatchObject({ severity: "medium", location: { x: 50, y: 50 } });
    expect(opinion.confidence).toBe(0.46);
  });

  it("flags uneven error levels across the whole image without singling out a region", () => {
    const opinion = analyzeSignals(encodePng(checkerboardRaster(400, 400)), "pattern.png");

    expect(types(opinion.anomalies)).toEqual(["metadata", "ela_global"]);
    expect(opinion.anomalies[1].description).toMatch(/^High error level variance \(\d+\.\d\)/);
    expect(opinion.confidence).toBe(0.76);
  });

  it("lets the critique discount error-level findings on a compact JPEG", () => {
    const bytes = encodeJpeg(checkerboardRaster(800, 800, { x: 0, y: 0, width: 200, height: 200 }));
    const opinion = analyzeSignals(bytes, "shared.jpg");

    const regions = opinion.anomalies.filter((item) => item.type === "ela_region");
    expect(regions).toHaveLength(1);
    expect(regions[0]).toMatchObject({ severity: "high", location: { x: 12, y: 12 } });

    const critique = new CritiqueEngine(new CritiqueHistory()).challenge(bytes, "shared.jpg", [opinion], {
      combinedScore: opinion.confidence,
      preliminaryVerdict: "inconclusive",
      reasoning: "",
      anomalySummary: { total: 0, high: 0, medium: 0, low: 0 },
    });

    expect(critique.challenges[0]).toMatchObject({
      kind: "false_positive_risk",
      targetSource: "forensic_technical",
      targetAnomaly: "ela",
    });
    expect(critique.confidenceAdjustment).toBe(0.05);
  });

  it("is deterministic for identical bytes", () => {
    const bytes = grayJpeg(320, 240);

    expect(analyzeSignals(bytes, "a.jpg")).toEqual(analyzeSignals(Buffer.from(bytes), "a.jpg"));
  });

  it("exposes the analysis through the opinion provider interface", async () => {
    const analyzer = new SignalAnalyzer();
    const bytes = grayJpeg(300, 200);

    expect(analyzer.kind).toBe("forensic_technical");
    await expect(analyzer.analyze(bytes, "a.jpg")).resolves.toEqual(analyzeSignals(bytes, "a.jpg"));
  });
});

describe("scoreAnomalies", () => {
  const item = (severity: Anomaly["severity"]): Anomaly => ({ type: "t", description: "d", severity });

  it("starts from the base confidence", () => {
    expect(scoreAnomalies([])).toBe(0.92);
  });

  it("subtracts severity penalties", () => {
    expect(scoreAnomalies([item("high"), item("medium"), item("low")])).toBe(0.66);
  });

  it("never drops below the floor", () => {
    expect(scoreAnomalies(Array.from({ length: 8 }, () => item("high")))).toBe(0.15);
  });
});

describe("subsampleChroma", () => {
  it("shares chroma across each 2x2 block and keeps per-pixel luma", () => {
    const { data } = subsampleChroma(checkerboardRaster(2, 2));

    expect(Array.from(data)).toEqual([
      151, 24, 151, 255, 104, 0, 104, 255,
      104, 0, 104, 255, 151, 24, 151, 255,
    ]);
  });

  it("leaves neutral gray untouched", () => {
    const raster = checkerboardRaster(3, 3, { x: 0, y: 0, width: 0, height: 0 });

    expect(Array.from(subsampleChroma(raster).data)).toEqual(Array.from(raster.data));
  });
});

describe("errorLevelAnalysis", () => {
  it("measures the chroma loss of a resave inside the edited area only", () => {
    const bytes = encodePng(checkerboardRaster(400, 400, { x: 200, y: 100, width: 200, height: 100 }));

    const stats = errorLevelAnalysis(bytes, "PNG");

    expect(stats.regions.filter((region) => region.mean > 15).map((region) => [region.row, region.col])).toEqual([
      [1, 2],
      [1, 3],
    ]);
    expect(stats.stdError).toBeGreaterThan(20);
    expect(stats.maxError).toBeGreaterThan(100);
  });

  it("splits the image into a 4x4 grid", () => {
    const stats = errorLevelAnalysis(grayJpeg(64, 48), "JPEG");

    expect(stats.regions).toHaveLength(16);
    expect(stats.regions[5]).toMatchObject({ row: 1, col: 1 });
    expect(stats.stdError).toBeLessThan(1);
  });

  it("skips regions for images smaller than the grid", () => {
    expect(errorLevelAnalysis(grayJpeg(3, 3), "JPEG").regions).toEqual([]);
  });

  it("throws when the pixels cannot be decoded", () => {
    expect(() => errorLevelAnalysis(Buffer.from("not a jpeg at all"), "JPEG")).toThrow();
  });
});
