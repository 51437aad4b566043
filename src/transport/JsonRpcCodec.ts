/**
 * JSON-RPC 2.0 line codec
 *
 * ElectrumX frames every message as one JSON document terminated by "\n".
 * A line may also hold a JSON array when the server answers a batch.
 *
 * @module transport/JsonRpcCodec
 */

import { z } from 'zod';
import { DataError } from '../utils/errors.js';
import type { RpcErrorPayload } from '../utils/errors.js';
import type { RequestId, RpcParams } from '../types/index.js';

export interface ResponseMessage {
  kind: 'response';
  id: RequestId | string | null;
  result: unknown;
  error?: RpcErrorPayload;
}

export interface NotificationMessage {
  kind: 'notification';
  method: string;
  params: unknown[];
  error?: RpcErrorPayload;
}

export type InboundMessage = ResponseMessage | NotificationMessage;

const ErrorPayloadSchema = z.union([
  z
    .object({
      code: z.number().optional(),
      message: z.string(),
    })
    .passthrough(),
  z.string().transform((message) => ({ message })),
]);

const NotificationSchema = z.object({
  method: z.string(),
  params: z.array(z.unknown()).default([]),
  error: ErrorPayloadSchema.nullish(),
});

const ResponseSchema = z.object({
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: ErrorPayloadSchema.nullish(),
});

export const JSONRPC_VERSION = '2.0';

export class JsonRpcCodec {
  encodeRequest(id: RequestId, method: string, params: RpcParams): string {
    return `${JSON.stringify({ jsonrpc: JSONRPC_VERSION, method, params, id })}\n`;
  }

  /**
   * Decodes one frame into its messages
   * @throws DataError if the frame is not valid JSON-RPC
   */
  decode(frame: string): InboundMessage[] {
    let payload: unknown;
    try {
      payload = JSON.parse(frame);
    } catch (error) {
      throw new DataError(
        'Inbound frame is not valid JSON',
        'FRAME',
        'JSON parse failed',
        { frame: frame.slice(0, 200) },
        error instanceof Error ? error : undefined,
      );
    }

    const items: unknown[] = Array.isArray(payload) ? payload : [payload];
    return items.map((item) => this.decodeMessage(item));
  }

  private decodeMessage(item: unknown): InboundMessage {
    const notification = NotificationSchema.safeParse(item);
    if (notification.success) {
      const { method, params, error } = notification.data;
      return error ? { kind: 'notification', method, params, error } : { kind: 'notification', method, params };
    }

    const response = ResponseSchema.safeParse(item);
    if (response.success) {
      const { id, result, error } = response.data;
      if (error) {
        return { kind: 'response', id, result: undefined, error };
      }
      return { kind: 'response', id, result: result ?? null };
    }

    throw DataError.schemaViolation('FRAME', response.error.message, item);
  }
}
