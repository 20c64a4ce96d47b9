import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import {
  MESSAGE_CONTRACTS,
  MessageTag,
  NetworkError,
  PROTOBUF_CONTENT_TYPE,
  PROTOCOL_VERSION_HEADER,
  ProtocolError,
  errorFromWire,
  pathForTag,
  type BookStoreCodec,
  type CallPhase,
  type NetworkFailureReason,
  type RequestPayload,
  type SuccessPayload,
} from '@bookstore/shared';

/** Bytes of an unexpected response body kept on the ProtocolError */
const BODY_EXCERPT_BYTES = 200;

export interface ExchangeOptions {
  signal?: AbortSignal;
  /** Observes each phase the call enters */
  onPhase?: (phase: CallPhase) => void;
}

/**
 * One RPC call: Idle -> Encoding -> InFlight -> Decoding -> Done.
 *
 * Resolves with the success payload of the shape the tag answers with, or
 * rejects with the first failure in this order: NetworkError, HTTP status,
 * content type, decoding, embedded application error, payload shape.
 */
export async function performExchange(
  http: AxiosInstance,
  codec: BookStoreCodec,
  tag: MessageTag,
  request: RequestPayload | null,
  options: ExchangeOptions = {}
): Promise<SuccessPayload> {
  const contract = MESSAGE_CONTRACTS[tag];
  const enter = (phase: CallPhase) => options.onPhase?.(phase);

  enter('Encoding');
  if (contract.method === 'GET' && request !== null) {
    throw new ProtocolError(`${tag} takes no argument`, { phase: 'Encoding' });
  }
  const body = contract.method === 'POST' ? codec.encodeRequest(request) : null;

  enter('InFlight');
  let response: AxiosResponse<ArrayBuffer>;
  try {
    response = await http.request<ArrayBuffer>({
      url: pathForTag(tag),
      method: contract.method,
      data: body === null ? undefined : Buffer.from(body),
      headers: {
        Accept: PROTOBUF_CONTENT_TYPE,
        [PROTOCOL_VERSION_HEADER]: String(codec.version),
        ...(body === null ? {} : { 'Content-Type': PROTOBUF_CONTENT_TYPE }),
      },
      responseType: 'arraybuffer',
      validateStatus: () => true,
      signal: options.signal,
    });
  } catch (error) {
    throw toNetworkError(tag, error);
  }

  enter('Decoding');
  const bytes = Buffer.from(response.data);

  if (response.status >= 400) {
    throw new ProtocolError(`${tag} failed with HTTP ${response.status}`, {
      phase: 'Decoding',
      status: response.status,
      bodyExcerpt: excerpt(bytes),
    });
  }

  const contentType = String(response.headers['content-type'] ?? '');
  if (!contentType.startsWith(PROTOBUF_CONTENT_TYPE)) {
    throw new ProtocolError(`${tag} answered with ${contentType || 'no content type'} instead of ${PROTOBUF_CONTENT_TYPE}`, {
      phase: 'Decoding',
      status: response.status,
      bodyExcerpt: excerpt(bytes),
    });
  }

  const version = response.headers[PROTOCOL_VERSION_HEADER];
  if (version !== undefined && version !== null && Number(version) !== codec.version) {
    throw new ProtocolError(`${tag} answered with protocol version ${String(version)}, expected ${codec.version}`, {
      phase: 'Decoding',
      status: response.status,
    });
  }

  const payload = codec.decodeResponse(bytes);
  if (payload.type === 'error') {
    throw errorFromWire(payload.error);
  }
  if (payload.type !== contract.response) {
    throw new ProtocolError(`${tag} answered with a ${payload.type} payload, expected ${contract.response}`, {
      phase: 'Decoding',
      status: response.status,
    });
  }

  enter('Done');
  return payload;
}

function excerpt(bytes: Buffer): string {
  return bytes.subarray(0, BODY_EXCERPT_BYTES).toString('utf8');
}

const TIMEOUT_CODES: ReadonlySet<string> = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const INTERRUPTED_CODES: ReadonlySet<string> = new Set(['ERR_CANCELED', 'ECONNRESET', 'EPIPE']);

function failureReason(error: unknown): NetworkFailureReason {
  if (axios.isCancel(error)) {
    return 'interrupted';
  }
  const code = axios.isAxiosError(error) ? error.code : undefined;
  if (code && TIMEOUT_CODES.has(code)) {
    return 'timeout';
  }
  if (code && INTERRUPTED_CODES.has(code)) {
    return 'interrupted';
  }
  return 'exchange';
}

function toNetworkError(tag: MessageTag, error: unknown): NetworkError {
  const reason = failureReason(error);
  const detail = error instanceof Error ? error.message : String(error);
  return new NetworkError(`${tag} call failed (${reason}): ${detail}`, reason, { phase: 'InFlight', cause: error });
}
