import type { IncomingMessage } from 'http';
import { ProtocolError } from '@bookstore/shared';

/**
 * Collect a binary request body. koa-bodyparser only understands JSON, form
 * and text bodies, so protobuf envelopes are read straight off the request.
 */
export async function readRawBody(req: IncomingMessage, limitBytes: number): Promise<Uint8Array> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limitBytes) {
    throw tooLarge(limitBytes);
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limitBytes) {
      throw tooLarge(limitBytes);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

function tooLarge(limitBytes: number): ProtocolError {
  return new ProtocolError(`Request body exceeds ${limitBytes} bytes`, { phase: 'InFlight', status: 413 });
}
