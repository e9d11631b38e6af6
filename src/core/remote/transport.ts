/**
 * Remote transports
 *
 * The binding layer only needs one capability from the engine: invoke a
 * method on a class or on an object reference with typed positional
 * arguments. HttpRpcTransport carries that as JSON-RPC 2.0 over HTTP.
 */

import fetch from "node-fetch";
import { ulid } from "ulid";
import { z } from "zod";
import { RemoteCallError } from "../errors";
import { RemoteCall, decodeValue } from "./types";

export interface RemoteTransport {
  invoke(call: RemoteCall): Promise<unknown>;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: {
    method: "POST";
    headers: Record<string, string>;
    body: string;
    timeout?: number;
  }
) => Promise<FetchResponseLike>;

export interface HttpRpcTransportOptions {
  url: string;
  /** 0 disables the timeout; fits can run for a long time. */
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetch?: FetchLike;
}

export const TRANSPORT_ERROR = "TRANSPORT_ERROR";

const RpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.string(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.union([z.string(), z.number()]),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

export class HttpRpcTransport implements RemoteTransport {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpRpcTransportOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async invoke(call: RemoteCall): Promise<unknown> {
    const id = ulid();
    const body = JSON.stringify({ jsonrpc: "2.0", id, method: "invoke", params: call });

    let response: FetchResponseLike;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.options.headers },
        body,
        timeout: this.options.timeoutMs ?? 0,
      });
    } catch (err) {
      throw new RemoteCallError(
        `Engine unreachable at ${this.options.url}: ${err instanceof Error ? err.message : String(err)}`,
        TRANSPORT_ERROR
      );
    }

    if (!response.ok) {
      throw new RemoteCallError(
        `Engine responded with HTTP ${response.status} ${response.statusText}`,
        TRANSPORT_ERROR,
        { status: response.status }
      );
    }

    let responseBody: unknown;
    try {
      responseBody = await response.json();
    } catch {
      throw new RemoteCallError("Engine returned a non-JSON body", TRANSPORT_ERROR);
    }

    const parsed = RpcResponseSchema.safeParse(responseBody);
    if (!parsed.success) {
      throw new RemoteCallError("Engine returned an invalid JSON-RPC envelope", TRANSPORT_ERROR, {
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    const envelope = parsed.data;
    if (envelope.id !== id) {
      throw new RemoteCallError(`Response id ${envelope.id} does not match request ${id}`, TRANSPORT_ERROR);
    }
    if (envelope.error) {
      throw new RemoteCallError(envelope.error.message, String(envelope.error.code), envelope.error.data);
    }

    return decodeValue(envelope.result ?? null);
  }
}
