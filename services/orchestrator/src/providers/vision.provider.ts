import { Logger } from "@nestjs/common";
import { z } from "zod";

import type { VisionClient } from "../clients/vision.client.js";
import { isPng } from "../imaging/probe.js";
import type { Anomaly, OpinionRecord } from "../types.js";
import { placeholderOpinion } from "./opinion-provider.js";
import type { OpinionProvider, VisionSourceKind } from "./opinion-provider.js";

interface VisionPrompt {
  system: string;
  user: string;
}

const ANOMALY_FORMAT =
  '{"type": "tag", "description": "detailed description", "severity": "high/medium/low", "location": {"x": 0-100, "y": 0-100}}';

export const VISION_PROMPTS: Record<VisionSourceKind, VisionPrompt> = {
  physical: {
    system: `You are a forensic physics expert analyzing images for authenticity.
Look for shadow direction inconsistencies, conflicting light sources, mismatched vanishing points,
inconsistent reflections and unnatural proportions.

RESPOND ONLY WITH JSON in this exact format:
{"anomalies": [${ANOMALY_FORMAT}], "confidence_score": 0.0-1.0, "summary": "short summary"}

If the image appears authentic with no issues, return an empty anomalies array and a high confidence_score.`,
    user: "Analyze this image for physical inconsistencies: shadows, lighting, perspective, reflections and proportions. Identify every anomaly.",
  },
  contextual: {
    system: `You are a historical and contextual forensic expert. Look for elements that do not match the
apparent time period (uniforms, weapons, technology, vehicles), architecture that does not fit the location
or era, vegetation inconsistent with the region, anachronistic typography or symbols, and clothing or
hairstyles that do not fit.

RESPOND ONLY WITH JSON in this exact format:
{"anomalies": [${ANOMALY_FORMAT}], "confidence_score": 0.0-1.0, "summary": "short summary"}

If nothing appears anachronistic, return an empty anomalies array and a high confidence_score.`,
    user: "Analyze this image for historical and contextual inconsistencies. Identify any element that does not belong to the apparent time period, location or cultural context.",
  },
  ai_generation: {
    system: `You are an expert in detecting AI-generated images. Determine whether the image was generated by a
model (DALL-E, Midjourney, Stable Diffusion, Firefly, ...), which tool most likely created it, and the key
indicators: malformed hands or fingers, distorted text, repetitive textures, asymmetric eyes, unnatural skin,
impossible geometry, blurred backgrounds.

RESPOND ONLY WITH JSON in this exact format:
{"is_ai_generated": true/false, "likely_tool": "tool name or unknown", "confidence": 0.0-1.0, "indicators": [${ANOMALY_FORMAT}], "summary": "short summary"}`,
    user: "Determine if this image was generated by AI. If so, identify the likely tool and all telltale signs. Be precise and avoid false positives.",
  },
};

const anomalySchema = z.object({
  type: z.string().default("unspecified"),
  description: z.string().default(""),
  severity: z.enum(["low", "medium", "high"]).catch("medium"),
  location: z
    .object({
      x: z.number().transform((value) => Math.min(100, Math.max(0, value))),
      y: z.number().transform((value) => Math.min(100, Math.max(0, value))),
    })
    .optional()
    .catch(undefined),
});

const confidenceSchema = z.number().min(0).max(1).catch(0.7);

const plausibilitySchema = z.object({
  anomalies: z.array(anomalySchema).default([]),
  confidence_score: confidenceSchema.default(0.7),
  summary: z.string().default(""),
});

const aiGenerationSchema = z.object({
  is_ai_generated: z.boolean().default(false),
  likely_tool: z.string().default("unknown"),
  confidence: confidenceSchema.default(0.7),
  indicators: z.array(anomalySchema).default([]),
  summary: z.string().default(""),
});

/** Parses a model reply, tolerating a surrounding markdown code fence. */
export function parseModelJson(text: string): unknown {
  let body = text.trim();
  if (body.startsWith("```")) {
    body = body.slice(body.indexOf("\n") + 1);
    const fence = body.lastIndexOf("```");
    if (fence >= 0) {
      body = body.slice(0, fence);
    }
  }
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export function sniffImageMimeType(bytes: Buffer): string {
  if (isPng(bytes)) {
    return "image/png";
  }
  if (bytes.length >= 12 && bytes.toString("latin1", 0, 4) === "RIFF" && bytes.toString("latin1", 8, 12) === "WEBP") {
    return "image/webp";
  }
  return "image/jpeg";
}

function toAnomalies(items: z.infer<typeof anomalySchema>[]): Anomaly[] {
  return items.map(({ type, description, severity, location }) =>
    location ? { type, description, severity, location } : { type, description, severity },
  );
}

export function toOpinion(kind: VisionSourceKind, payload: unknown, clientName: string): OpinionRecord | undefined {
  if (kind === "ai_generation") {
    const parsed = aiGenerationSchema.safeParse(payload);
    if (!parsed.success) {
      return undefined;
    }
    const data = parsed.data;
    const anomalies = toAnomalies(data.indicators);
    if (data.is_ai_generated) {
      anomalies.unshift({
        type: "ai_generated",
        description: `The image was identified as AI-generated. Likely tool: ${data.likely_tool}.`,
        severity: "high",
        location: { x: 50, y: 50 },
      });
    }
    return {
      sourceKind: kind,
      confidence: data.confidence,
      findings: {
        isAiGenerated: data.is_ai_generated,
        likelyTool: data.likely_tool,
        summary: data.summary,
        source: clientName,
      },
      anomalies,
    };
  }

  const parsed = plausibilitySchema.safeParse(payload);
  if (!parsed.success) {
    return undefined;
  }
  return {
    sourceKind: kind,
    confidence: parsed.data.confidence_score,
    findings: { summary: parsed.data.summary, source: clientName },
    anomalies: toAnomalies(parsed.data.anomalies),
  };
}

/**
 * Opinion backed by an external vision model. Clients are tried in order;
 * when none answers with a usable reply the fixed placeholder opinion for
 * this source is returned.
 */
export class VisionOpinionProvider implements OpinionProvider {
  private readonly logger: Logger;

  constructor(
    readonly kind: VisionSourceKind,
    private readonly clients: readonly VisionClient[],
  ) {
    this.logger = new Logger(`VisionOpinionProvider:${kind}`);
  }

  async analyze(fileBytes: Buffer, filename: string): Promise<OpinionRecord> {
    const prompt = VISION_PROMPTS[this.kind];
    const image = { base64: fileBytes.toString("base64"), mimeType: sniffImageMimeType(fileBytes) };

    for (const client of this.clients) {
      let reply: string | undefined;
      try {
        reply = await client.describe({ image, systemPrompt: prompt.system, userPrompt: prompt.user });
      } catch (error) {
        this.logger.warn(`${client.name} failed for ${filename}: ${(error as Error).message}`);
        continue;
      }
      if (!reply) {
        continue;
      }
      const opinion = toOpinion(this.kind, parseModelJson(reply), client.name);
      if (opinion) {
        return opinion;
      }
      this.logger.warn(`${client.name} returned an unparseable reply for ${filename}`);
      break;
    }

    return placeholderOpinion(this.kind);
  }
}
