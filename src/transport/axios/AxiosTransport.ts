/**
 * Axios transport.
 *
 * Implements the Transport interface on top of an Axios instance configured
 * with the client's base URL, timeout, default headers and bearer token.
 *
 * - GET and DELETE send params as the query string
 * - POST, PUT and PATCH send params as the JSON body
 *
 * @module AxiosTransport
 */

import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosResponse } from "axios";
import type { Transport, TransportRequest, TransportResponse } from "../Transport";
import type { ClientConfig } from "../../config";
import { ServerError, TransportError } from "../../errors";

function flattenHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      flat[name] = value;
    } else if (Array.isArray(value)) {
      flat[name] = value.join(", ");
    } else if (typeof value === "number" || typeof value === "boolean") {
      flat[name] = String(value);
    }
  }
  return flat;
}

export interface AxiosTransportOptions {
  /**
   * Axios adapter to dispatch through instead of Node's http module.
   * A custom adapter settles the status itself: it must reject with an
   * AxiosError for non-success responses.
   */
  readonly adapter?: AxiosAdapter;
}

/**
 * Transport backed by Axios.
 *
 * @example
 * ```typescript
 * const transport = new AxiosTransport({
 *   baseUrl: "https://api.example.com",
 *   apiKey: "test-secret",
 *   timeoutMs: 30000,
 *   headers: {},
 *   debug: false
 * });
 *
 * const response = await transport.send({ method: "GET", path: "/events", headers: {} });
 * ```
 */
export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance;

  constructor(config: ClientConfig, options: AxiosTransportOptions = {}) {
    this.http = axios.create({
      ...(options.adapter ? { adapter: options.adapter } : {}),
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Accept: "application/json",
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const sendsQuery = request.method === "GET" || request.method === "DELETE";

    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.path,
        headers: { ...request.headers },
        ...(sendsQuery ? { params: request.params } : { data: request.params }),
      });

      return {
        status: response.status,
        headers: flattenHeaders(response.headers),
        body: response.data,
      };
    } catch (error) {
      throw this.toTransportFailure(request, error);
    }
  }

  /**
   * Map an Axios failure to ServerError (a response arrived) or
   * TransportError (nothing arrived).
   */
  private toTransportFailure(request: TransportRequest, error: unknown): Error {
    const target = `${request.method} ${request.path}`;

    if (error instanceof AxiosError) {
      if (error.response) {
        return new ServerError(
          error.response.status,
          error.response.data,
          `${target} failed with status ${error.response.status}`,
        );
      }
      return new TransportError(`${target} failed: ${error.message}`, { cause: error });
    }

    return new TransportError(
      `${target} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
