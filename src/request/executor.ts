/**
 * Single-request dispatch through a Transport.
 *
 * @module executor
 */

import type { Transport } from "../transport/Transport";
import type { Headers, RequestOptions } from "../types/endpoint";
import { ResponseHash } from "../response/ResponseHash";

export interface RequestExecutorOptions {
  /**
   * Headers sent with every request, beneath per-call headers.
   */
  readonly defaultHeaders?: Headers;

  /**
   * Log each dispatch and its status to the console.
   */
  readonly debug?: boolean;
}

function hasHeader(headers: Headers, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

/**
 * Issues one HTTP call and wraps the decoded body.
 *
 * Transport errors (TransportError, ServerError) are not caught here; they
 * reach the caller as thrown by the transport.
 */
export class RequestExecutor {
  constructor(
    private readonly transport: Transport,
    private readonly options: RequestExecutorOptions = {},
  ) {}

  async execute(request: RequestOptions): Promise<ResponseHash> {
    const headers: Record<string, string> = {
      ...this.options.defaultHeaders,
      ...request.headers,
    };

    if (request.method === "POST" && !hasHeader(headers, "Content-Type")) {
      headers["Content-Type"] = "application/json";
    }

    if (this.options.debug) {
      console.debug(`[endpoint-kit] ${request.method} ${request.path}`);
    }

    const response = await this.transport.send({
      method: request.method,
      path: request.path,
      params: request.params,
      headers,
    });

    if (this.options.debug) {
      console.debug(`[endpoint-kit] ${request.method} ${request.path} -> ${response.status}`);
    }

    return new ResponseHash(response.body, response);
  }
}
