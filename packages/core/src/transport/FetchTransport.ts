/**
 * Fetch Transport
 *
 * ScreeningTransport over the global fetch API. The timeout here is the only
 * one in the library.
 */

import { RequestFailed } from '../errors';
import { Logger } from '../utils/logger';
import { ScreeningTransport, TransportResponse, XML_CONTENT_TYPE } from './types';

export interface FetchTransportConfig {
  timeoutMs?: number;
}

export class FetchTransport implements ScreeningTransport {
  private timeoutMs: number;

  constructor(config?: FetchTransportConfig) {
    this.timeoutMs = config?.timeoutMs || 30000;
    Logger.debug(`[FetchTransport] Initialized (timeout ${this.timeoutMs}ms)`);
  }

  async post(url: string, body: string): Promise<TransportResponse> {
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': XML_CONTENT_TYPE },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      Logger.error(`[FetchTransport] ✗ POST ${url} failed: ${reason}`);
      throw new RequestFailed(`Transport failure for ${url}: ${reason}`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RequestFailed(`Failed to read response body from ${url}: ${reason}`, {
        status: response.status,
        cause: error,
      });
    }

    Logger.debug(`[FetchTransport] POST ${url} -> ${response.status} (${Date.now() - startTime}ms)`);
    return { status: response.status, body: text };
  }
}
