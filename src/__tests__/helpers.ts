import type { Transport, TransportRequest, TransportResponse } from '../clients/transport.js';

/** Replays queued responses in order and records every request it receives. */
export class ScriptedTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly script: Array<TransportResponse | Error> = [];

  reply(...responses: Array<TransportResponse | Error>): this {
    this.script.push(...responses);
    return this;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const next = this.script.shift();
    if (!next) {
      throw new Error(`No scripted response for ${request.path}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function respond(status: number, headers: Record<string, string> = {}, body?: Uint8Array): TransportResponse {
  return { status, headers: new Headers(headers), body };
}

export function text(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}
