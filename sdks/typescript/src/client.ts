import { CaseResponse, ReviewResponse, VerifyRequest, VerifyResponse } from './types.js';

export interface VerificationClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class VerificationClientError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'VerificationClientError';
    this.status = status;
    this.body = body;
  }
}

export class VerificationClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: VerificationClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async verify(payload: VerifyRequest): Promise<VerifyResponse> {
    if (!payload.clientId) {
      throw new Error('clientId is required');
    }
    const file = payload.file instanceof Blob ? payload.file : new Blob([new Uint8Array(payload.file)]);
    const form = new FormData();
    form.append('file', file, payload.filename);
    form.append('clientId', payload.clientId);
    if (payload.context !== undefined) {
      form.append('context', payload.context);
    }
    if (payload.mediaKind !== undefined) {
      form.append('mediaKind', payload.mediaKind);
    }

    // fetch sets the multipart boundary itself
    const response = await this.fetchImpl(`${this.baseUrl}/verify`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new VerificationClientError(`Verify request failed with ${response.status}: ${body}`, response.status, body);
    }

    return (await response.json()) as VerifyResponse;
  }

  async getCase(caseId: string): Promise<CaseResponse> {
    if (!caseId) {
      throw new Error('caseId is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/verify/${encodeURIComponent(caseId)}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    await this.ensureOk(response, 'Case');
    return (await response.json()) as CaseResponse;
  }

  async requestReview(caseId: string, preferredDomain?: string): Promise<ReviewResponse> {
    if (!caseId) {
      throw new Error('caseId is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/verify/${encodeURIComponent(caseId)}/hitl`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify(preferredDomain === undefined ? {} : { preferredDomain }),
    });

    await this.ensureOk(response, 'Review');
    return (await response.json()) as ReviewResponse;
  }

  private async ensureOk(response: Response, label: string): Promise<void> {
    if (response.status === 404) {
      const body = await this.readErrorBody(response);
      throw new VerificationClientError('Case not found', 404, body);
    }
    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new VerificationClientError(`${label} request failed with ${response.status}: ${body}`, response.status, body);
    }
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
