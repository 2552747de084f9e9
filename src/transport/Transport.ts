/**
 * Transport interface for performing HTTP requests against the remote API.
 *
 * This interface defines the contract every transport (Axios, an in-process
 * fake in tests, etc.) must implement. Transports own network I/O, status
 * handling and body decoding; the request pipeline never inspects status codes.
 *
 * @module transport
 */

import type { Headers, HttpMethod, Params } from "../types/endpoint";

/**
 * A single request handed to a transport.
 *
 * @example
 * ```typescript
 * const request: TransportRequest = {
 *   method: "GET",
 *   path: "/events",
 *   params: { limit: 10, cursor: "cursor_abc" },
 *   headers: {}
 * };
 * ```
 */
export interface TransportRequest {
  readonly method: HttpMethod;

  /**
   * Path relative to the API base URL, starting with a slash.
   */
  readonly path: string;

  /**
   * Query parameters (GET, DELETE) or JSON body (POST, PUT, PATCH).
   */
  readonly params?: Params;

  readonly headers: Headers;
}

/**
 * A response returned by a transport.
 */
export interface TransportResponse {
  readonly status: number;

  readonly headers: Readonly<Record<string, string>>;

  /**
   * Decoded body. For JSON APIs this is the parsed value.
   */
  readonly body: unknown;
}

/**
 * Transport interface for sending one HTTP request.
 *
 * Implementations resolve with the decoded response on success and reject
 * with TransportError (nothing received) or ServerError (non-success status)
 * otherwise. Those errors reach the caller of a resource operation unchanged.
 *
 * @example
 * ```typescript
 * const transport: Transport = new AxiosTransport(config);
 *
 * const response = await transport.send({
 *   method: "GET",
 *   path: "/events/event_123",
 *   headers: {}
 * });
 * console.log(response.status, response.body);
 * ```
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}
