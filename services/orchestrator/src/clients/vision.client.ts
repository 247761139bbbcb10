import { z } from "zod";

export interface VisionImage {
  base64: string;
  mimeType: string;
}

export interface VisionRequest {
  image: VisionImage;
  systemPrompt: string;
  userPrompt: string;
}

/** A large-model vision service that answers a prompt about one image. */
export interface VisionClient {
  readonly name: string;
  describe(request: VisionRequest): Promise<string | undefined>;
}

export interface VisionClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class VisionClientError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "VisionClientError";
    this.status = status;
  }
}

abstract class HttpVisionClient implements VisionClient {
  abstract readonly name: string;
  protected readonly apiKey: string;
  protected readonly model: string;
  protected readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: VisionClientOptions, defaultBaseUrl: string) {
    if (!options.apiKey) {
      throw new Error("vision client requires an apiKey");
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.baseUrl = (options.baseUrl ?? defaultBaseUrl).replace(/\/$/, "");
    this.fetchFn = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  abstract describe(request: VisionRequest): Promise<string | undefined>;

  protected async post(path: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: { "content-type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new VisionClientError(`${this.name} request failed: ${response.status} ${text}`, response.status);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new VisionClientError(`${this.name} request timed out`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).min(1),
});

const openAiResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

export class AnthropicVisionClient extends HttpVisionClient {
  readonly name = "anthropic";

  constructor(options: VisionClientOptions) {
    super(options, "https://api.anthropic.com");
  }

  async describe(request: VisionRequest): Promise<string | undefined> {
    const body = await this.post(
      "/v1/messages",
      { "x-api-key": this.apiKey, "anthropic-version": "2023-06-01" },
      {
        model: this.model,
        max_tokens: 2000,
        system: request.systemPrompt,
        messages: [
          {
            role: "user",
            content: [
              {
                type: "image",
                source: { type: "base64", media_type: request.image.mimeType, data: request.image.base64 },
              },
              { type: "text", text: request.userPrompt },
            ],
          },
        ],
      },
    );
    const parsed = anthropicResponseSchema.safeParse(body);
    return parsed.success ? parsed.data.content[0].text : undefined;
  }
}

export class OpenAiVisionClient extends HttpVisionClient {
  readonly name = "openai";

  constructor(options: VisionClientOptions) {
    super(options, "https://api.openai.com");
  }

  async describe(request: VisionRequest): Promise<string | undefined> {
    const body = await this.post(
      "/v1/chat/completions",
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: this.model,
        max_tokens: 1500,
        messages: [
          { role: "system", content: request.systemPrompt },
          {
            role: "user",
            content: [
              { type: "text", text: request.userPrompt },
              {
                type: "image_url",
                image_url: { url: `data:${request.image.mimeType};base64,${request.image.base64}`, detail: "high" },
              },
            ],
          },
        ],
      },
    );
    const parsed = openAiResponseSchema.safeParse(body);
    return parsed.success ? parsed.data.choices[0].message.content ?? undefined : undefined;
  }
}
