import axios, { type AxiosInstance } from 'axios';
import {
  MessageTag,
  NetworkError,
  ProtocolError,
  TransportError,
  createLogger,
  getCodec,
  type Book,
  type BookStoreCodec,
  type CallPhase,
  type Logger,
  type RequestPayload,
  type StockBook,
  type SuccessPayload,
} from '@bookstore/shared';
import { loadClientConfig } from '../config';
import { performExchange } from './exchange';

export interface RpcClientOptions {
  serverUrl?: string;
  timeoutMs?: number;
  codec?: BookStoreCodec;
  logger?: Logger;
}

let sharedLogger: Logger | undefined;

/** Created on first use */
function defaultLogger(): Logger {
  if (!sharedLogger) {
    sharedLogger = createLogger('store-client');
  }
  return sharedLogger;
}

/**
 * Shared plumbing for the customer and stock-manager proxies: one axios
 * instance per client, one exchange per call, no retries.
 */
export abstract class BaseRpcClient {
  readonly serverUrl: string;
  protected readonly http: AxiosInstance;
  protected readonly codec: BookStoreCodec;
  protected readonly logger: Logger;
  private controller = new AbortController();
  private stopped = false;

  constructor(options: RpcClientOptions = {}) {
    const config = loadClientConfig({ serverUrl: options.serverUrl, timeoutMs: options.timeoutMs });
    this.serverUrl = config.serverUrl;
    this.http = axios.create({ baseURL: config.serverUrl, timeout: config.timeoutMs });
    this.codec = options.codec ?? getCodec();
    this.logger = options.logger ?? defaultLogger();
  }

  /**
   * Abort in-flight calls and refuse new ones. Aborted calls reject with an
   * interrupted NetworkError.
   */
  stop(): void {
    this.stopped = true;
    this.controller.abort();
    this.controller = new AbortController();
  }

  protected async call(tag: MessageTag, request: RequestPayload | null): Promise<SuccessPayload> {
    if (this.stopped) {
      throw new NetworkError(`${tag} call refused: client is stopped`, 'interrupted', { phase: 'Idle' });
    }

    const start = Date.now();
    let phase: CallPhase = 'Idle';
    try {
      const payload = await performExchange(this.http, this.codec, tag, request, {
        signal: this.controller.signal,
        onPhase: (next) => {
          phase = next;
        },
      });
      this.logger.debug({ tag, duration: Date.now() - start }, 'RPC call completed');
      return payload;
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger.warn({ tag, phase, error: error.message }, 'RPC call failed');
      }
      throw error;
    }
  }

  protected async callForEmpty(tag: MessageTag, request: RequestPayload | null): Promise<void> {
    const payload = await this.call(tag, request);
    if (payload.type !== 'empty') {
      throw unexpected(tag, payload);
    }
  }

  protected async callForBooks(tag: MessageTag, request: RequestPayload | null): Promise<Book[]> {
    const payload = await this.call(tag, request);
    if (payload.type !== 'books') {
      throw unexpected(tag, payload);
    }
    return payload.books;
  }

  protected async callForStockBooks(tag: MessageTag, request: RequestPayload | null): Promise<StockBook[]> {
    const payload = await this.call(tag, request);
    if (payload.type !== 'stockBooks') {
      throw unexpected(tag, payload);
    }
    return payload.books;
  }
}

function unexpected(tag: MessageTag, payload: SuccessPayload): ProtocolError {
  return new ProtocolError(`${tag} answered with an unexpected ${payload.type} payload`, { phase: 'Decoding' });
}
