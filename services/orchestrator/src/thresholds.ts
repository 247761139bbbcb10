import type { Severity } from "./types.js";

export const BASE_CONFIDENCE = 0.92;
export const MIN_CONFIDENCE = 0.15;
export const UNDECODABLE_CONFIDENCE = 0.5;

export const SEVERITY_PENALTY: Record<Severity, number> = {
  high: 0.15,
  medium: 0.08,
  low: 0.03,
};

export const EDITING_TOOLS = ["photoshop", "gimp", "lightroom", "snapseed", "picsart", "canva"] as const;

/** Output sizes produced by common image generation models. */
export const GENERATIVE_DIMENSIONS: ReadonlyArray<readonly [number, number]> = [
  [512, 512],
  [768, 768],
  [1024, 1024],
  [1024, 1792],
  [1792, 1024],
  [512, 768],
  [768, 512],
  [1024, 768],
  [768, 1024],
];

export const ELA = {
  resaveQuality: 95,
  gridSize: 4,
  regionRatio: 2.5,
  regionFloor: 15,
  globalStdLimit: 20,
} as const;

export const COMPRESSION = {
  quantStdLimit: 25,
  minBytesPerPixel: 0.1,
} as const;

export const SOURCE_WEIGHTS: Record<string, number> = {
  forensic_technical: 0.35,
  physical: 0.25,
  contextual: 0.2,
  ai_generation: 0.2,
};

export const DEFAULT_SOURCE_WEIGHT = 0.1;

export const VERDICT = {
  authenticScore: 0.75,
  forgedHighCount: 3,
  weakForgedHighCount: 2,
  weakForgedScore: 0.5,
  lowSourceConfidence: 0.6,
} as const;

export const CRITIQUE = {
  socialBytesPerPixel: 0.3,
  socialAdjustment: 0.05,
  blindSpotConfidence: 0.8,
  spreadLimit: 0.3,
  spreadAdjustment: -0.03,
  disagreementLimit: 0.25,
  minDimension: 200,
  maxDimension: 5000,
  contradictoryForgedScore: 0.7,
  trendWindow: 5,
  trendChallengeAverage: 3,
} as const;

export const ADJUSTED_SCORE_RANGE = { min: 0.05, max: 0.99 } as const;
