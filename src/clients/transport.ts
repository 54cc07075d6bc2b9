import { TransportError } from '../errors.js';

export interface TransportRequest {
  host: string;
  /** Path of the resource on `host`, starting with `/`. */
  path: string;
  headers: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  headers: Headers;
  /** Only present for 200 responses. */
  body?: Uint8Array | undefined;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export type Scheme = 'http' | 'https';

export interface FetchTransportOptions {
  scheme?: Scheme;
  timeoutMs?: number;
  userAgent?: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_USER_AGENT = 'conditional-fetch-cache/0.1.0';

export class FetchTransport implements Transport {
  private readonly scheme: Scheme;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FetchTransportOptions = {}) {
    this.scheme = options.scheme ?? 'https';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = `${this.scheme}://${request.host}${request.path}`;

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          ...request.headers,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status !== 200) {
        // Nothing to read, but the stream still holds the connection until cancelled.
        await response.body?.cancel();
        return { status: response.status, headers: response.headers };
      }

      const body = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, headers: response.headers, body };
    } catch (error) {
      throw new TransportError(url, error);
    }
  }
}
