/**
 * Pagination domain types.
 *
 * @module page
 */

import type { ResponseHash } from "../response/ResponseHash";

/**
 * Caller-requested maximum number of items across all pages.
 *
 * - unbounded: no `limit` given, a single page is fetched
 * - all: `limit: "all"`, every page is fetched
 * - bounded: `limit: n`, pages are fetched until n items were delivered
 */
export type Limit =
  | { readonly kind: "unbounded" }
  | { readonly kind: "all" }
  | { readonly kind: "bounded"; readonly count: number };

/**
 * One page as read from a response body.
 */
export interface ResponsePage {
  readonly data: readonly unknown[];

  /**
   * Opaque continuation token, sent back as-is. null on the final page.
   */
  readonly nextCursor: unknown;
}

/**
 * Handler invoked once per delivered page.
 *
 * Receives the (possibly trimmed) items of each page. When the endpoint turns
 * out not to be paginated it is invoked exactly once with the whole response.
 */
export type PageHandler = (
  page: unknown[] | ResponseHash,
) => void | Promise<void>;
