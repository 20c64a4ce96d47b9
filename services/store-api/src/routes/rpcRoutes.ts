import Router from 'koa-router';
import {
  MESSAGE_CONTRACTS,
  PROTOBUF_CONTENT_TYPE,
  PROTOCOL_VERSION_HEADER,
  ProtocolError,
  tagFromSegment,
} from '@bookstore/shared';
import type { RpcDispatcher } from '../rpc/dispatcher';
import { readRawBody } from '../rpc/readBody';

export interface RpcRouteOptions {
  protocolVersion: number;
  bodyLimitBytes: number;
}

/**
 * One route per message tag, at `/<tag in lower case>`.
 */
export function createRpcRouter(dispatcher: RpcDispatcher, options: RpcRouteOptions): Router {
  const router = new Router();

  router.all('/:tag', async (ctx) => {
    const segment = String(ctx.params.tag);
    const tag = tagFromSegment(segment);
    if (!tag) {
      throw new ProtocolError(`Unknown message tag "${segment}"`, { phase: 'Decoding', status: 400 });
    }
    ctx.state.tag = tag;

    const contract = MESSAGE_CONTRACTS[tag];
    if (ctx.method !== contract.method) {
      ctx.set('Allow', contract.method);
      throw new ProtocolError(`${tag} must be sent with ${contract.method}`, { phase: 'Decoding', status: 405 });
    }

    const version = ctx.get(PROTOCOL_VERSION_HEADER);
    if (version && Number(version) !== options.protocolVersion) {
      throw new ProtocolError(
        `Protocol version ${version} is not supported; this server speaks version ${options.protocolVersion}`,
        { phase: 'Decoding', status: 400 }
      );
    }

    let body: Uint8Array | null = null;
    if (contract.method === 'POST') {
      if (ctx.request.type !== PROTOBUF_CONTENT_TYPE) {
        throw new ProtocolError(`${tag} requests must be sent as ${PROTOBUF_CONTENT_TYPE}`, {
          phase: 'Decoding',
          status: 415,
        });
      }
      body = await readRawBody(ctx.req, options.bodyLimitBytes);
    }

    ctx.set(PROTOCOL_VERSION_HEADER, String(options.protocolVersion));
    ctx.type = PROTOBUF_CONTENT_TYPE;
    ctx.body = Buffer.from(dispatcher.dispatch(tag, body));
  });

  return router;
}
