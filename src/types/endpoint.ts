/**
 * Endpoint domain types: HTTP verbs, endpoint descriptors and call arguments.
 *
 * @module endpoint
 */

/**
 * HTTP methods an endpoint may be declared with.
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Request parameters. Sent as the query string for GET and DELETE, as the
 * JSON body otherwise.
 */
export type Params = Readonly<Record<string, unknown>>;

/**
 * Request headers, by header name.
 */
export type Headers = Readonly<Record<string, string>>;

/**
 * Immutable descriptor of one resource operation.
 *
 * The two type parameters carry `requiresId` and `paginated` as literal types
 * so that the generated operation gets the matching call signature and
 * return type.
 *
 * @example
 * ```typescript
 * const close: EndpointSpec<true, false> = {
 *   operationName: "close",
 *   httpMethod: "POST",
 *   urlSegments: ["close"],
 *   requiresId: true,
 *   paginated: false,
 * };
 * // buildPath("/accounts", close, "account_123") => "/accounts/account_123/close"
 * ```
 */
export interface EndpointSpec<
  TRequiresId extends boolean = boolean,
  TPaginated extends boolean = boolean,
> {
  /**
   * Name of the generated operation, unique per resource type.
   */
  readonly operationName: string;

  readonly httpMethod: HttpMethod;

  /**
   * Zero to two literal path segments.
   *
   * With one segment and an id the path is `root/{id}/segment0`; with two
   * segments it is `root/segment0/{id}/segment1`.
   */
  readonly urlSegments: readonly string[];

  /**
   * Whether a resource identifier must be passed as the first argument.
   */
  readonly requiresId: TRequiresId;

  /**
   * Whether the response is a page of results plus a continuation cursor.
   */
  readonly paginated: TPaginated;
}

/**
 * Options accepted when declaring an endpoint.
 *
 * @example
 * ```typescript
 * // POST /accounts/{id}/close
 * const close: EndpointOptions<true, false> = { id: true, pagination: false };
 * // GET /cards/{id}/details
 * const details: EndpointOptions<true, false> = { to: "details", id: true, pagination: false };
 * ```
 */
export interface EndpointOptions<TRequiresId extends boolean, TPaginated extends boolean> {
  /**
   * Path segments after the resource root. A string is a single segment,
   * an empty array targets the root itself. Defaults to the operation name.
   */
  readonly to?: string | readonly string[];

  readonly id: TRequiresId;

  readonly pagination: TPaginated;
}

/**
 * A request ready for dispatch.
 */
export interface RequestOptions {
  readonly method: HttpMethod;
  readonly path: string;
  readonly params?: Params;
  readonly headers?: Headers;
}
