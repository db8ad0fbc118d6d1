import { getLogger, type Logger } from '@endpointkit/logger';
import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';

import type { HttpRequest, Transport, TransportOptions, TransportResponse } from './types.js';

export interface FetchTransportConfig {
  /** Per-request timeout in milliseconds. Defaults to 10 seconds. */
  timeoutMs?: number | undefined;
  /**
   * Defaults to a keep-alive undici Agent owned by the transport. An injected
   * dispatcher stays open on `close()`; its owner closes it.
   */
  dispatcher?: Dispatcher | undefined;
}

/**
 * Transport over undici's fetch. Holds a keep-alive agent; call `close()`
 * to release its connections.
 */
export class FetchTransport implements Transport {
  private readonly logger: Logger;
  private readonly agent: Dispatcher;
  private readonly ownsAgent: boolean;
  private readonly timeoutMs: number;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void> | undefined;
  private isClosed = false;

  constructor(config: FetchTransportConfig = {}) {
    this.logger = getLogger('FetchTransport');
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.ownsAgent = config.dispatcher === undefined;
    this.agent =
      config.dispatcher ??
      new Agent({
        keepAliveMaxTimeout: 60_000,
        keepAliveTimeout: 10_000,
        pipelining: 1,
      });
  }

  async send(request: HttpRequest, options: TransportOptions = {}): Promise<TransportResponse> {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    const response = await undiciFetch(request.url, {
      body: request.body ?? null,
      dispatcher: this.agent,
      headers: { ...request.headers },
      method: request.method,
      signal,
    });

    const payload = new Uint8Array(await response.arrayBuffer());
    return {
      metadata: {
        headers: Object.fromEntries(response.headers.entries()),
        status: response.status,
      },
      payload,
    };
  }

  /**
   * Closes the undici agent the transport created so keep-alive connections do
   * not hold the process open. Idempotent: later calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    if (!this.ownsAgent) {
      this.isClosed = true;
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }
}
