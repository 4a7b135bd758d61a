/**
 * Mock Transport
 *
 * In-process ScreeningTransport for tests: canned responses (queued, per
 * endpoint path, or default), injectable failures, and a call history.
 */

import { Logger } from '../utils/logger';
import { ScreeningTransport, TransportResponse } from './types';

export interface RecordedCall {
  url: string;
  body: string;
}

type CannedReply = TransportResponse | Error;

export class MockTransport implements ScreeningTransport {
  private queue: CannedReply[] = [];
  private byPath: Map<string, CannedReply> = new Map();
  private fallback?: CannedReply;
  private callHistory: RecordedCall[] = [];

  /**
   * Queue a one-shot reply; queued replies are used first, in order.
   * An Error makes the call reject with it.
   */
  enqueue(reply: CannedReply): this {
    this.queue.push(reply);
    return this;
  }

  /**
   * Reply for every call whose URL path ends with `path`
   */
  setResponse(path: string, reply: CannedReply): this {
    this.byPath.set(path, reply);
    return this;
  }

  setDefaultResponse(reply: CannedReply): this {
    this.fallback = reply;
    return this;
  }

  getCalls(): RecordedCall[] {
    return [...this.callHistory];
  }

  getLastCall(): RecordedCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  async post(url: string, body: string): Promise<TransportResponse> {
    this.callHistory.push({ url, body });

    const reply = this.queue.shift() ?? this.replyForPath(url) ?? this.fallback;
    if (reply === undefined) {
      return { status: 404, body: 'No mock response configured' };
    }
    if (reply instanceof Error) {
      throw reply;
    }

    Logger.debug(`[MockTransport] ✓ Returned ${reply.status} for ${url}`);
    return { ...reply };
  }

  private replyForPath(url: string): CannedReply | undefined {
    const path = new URL(url).pathname;
    for (const [suffix, reply] of this.byPath) {
      if (path.endsWith(suffix)) {
        return reply;
      }
    }
    return undefined;
  }
}
