/**
 * Cursor-based pagination over a RequestExecutor.
 *
 * Every entry point runs the same page loop:
 *
 * 1. dispatch with the current params
 * 2. a response without `data` ends the loop (non-paginated endpoint)
 * 3. trim the page so the running total never passes a bounded limit
 * 4. deliver the page
 * 5. stop on: no limit, limit reached, or no `next_cursor`
 * 6. otherwise copy the params with `cursor` set and go again
 *
 * @module paginator
 */

import type { Params, RequestOptions } from "../types/endpoint";
import type { PageHandler } from "../types/page";
import type { RequestExecutor } from "./executor";
import type { ResponseHash } from "../response/ResponseHash";
import { parseLimit, stripsLimit } from "./limit";
import { unwrap } from "../utils/result";
import { ResponseShapeError } from "../errors";

type FetchedPage =
  | { readonly kind: "page"; readonly items: unknown[]; readonly response: ResponseHash }
  | { readonly kind: "raw"; readonly response: ResponseHash };

function withoutLimit(params: Params): Params {
  const copy: Record<string, unknown> = { ...params };
  delete copy.limit;
  return copy;
}

function notAPage(request: RequestOptions): ResponseShapeError {
  return new ResponseShapeError(
    `${request.method} ${request.path} did not return a page (no "data" field)`,
  );
}

/**
 * Drives a sequence of page requests following the server's cursor.
 *
 * The caller's params object is never modified: the outgoing params are a
 * copy, and each cursor is merged into a fresh copy.
 *
 * @example
 * ```typescript
 * const paginator = new Paginator(executor);
 *
 * // At most 250 events, over as many pages as the server needs
 * const events = await paginator.collect({
 *   method: "GET",
 *   path: "/events",
 *   params: { limit: 250 }
 * });
 *
 * // Every page, one at a time
 * for await (const page of paginator.pages({ method: "GET", path: "/events", params: { limit: "all" } })) {
 *   console.log(page.length);
 * }
 * ```
 */
export class Paginator {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Fetch pages and return all delivered items in order.
   *
   * Throws ResponseShapeError when the endpoint does not answer with a page.
   */
  async collect(request: RequestOptions): Promise<unknown[]> {
    const results: unknown[] = [];
    for await (const page of this.fetchPages(request)) {
      if (page.kind === "raw") {
        throw notAPage(request);
      }
      results.push(...page.items);
    }
    return results;
  }

  /**
   * Fetch pages and hand each one to `handler`.
   *
   * If the first response has no `data` field the handler is called once with
   * the whole response, which is also returned. Otherwise resolves to undefined.
   */
  async forEachPage(
    request: RequestOptions,
    handler: PageHandler,
  ): Promise<ResponseHash | undefined> {
    for await (const page of this.fetchPages(request)) {
      if (page.kind === "raw") {
        await handler(page.response);
        return page.response;
      }
      await handler(page.items);
    }
    return undefined;
  }

  /**
   * Lazily fetch pages. Leaving the loop early stops further requests.
   */
  async *pages(request: RequestOptions): AsyncGenerator<unknown[], void, undefined> {
    for await (const page of this.fetchPages(request)) {
      if (page.kind === "raw") {
        throw notAPage(request);
      }
      yield page.items;
    }
  }

  private async *fetchPages(
    request: RequestOptions,
  ): AsyncGenerator<FetchedPage, void, undefined> {
    const limit = unwrap(parseLimit(request.params));

    let params = request.params;
    if (params && stripsLimit(limit)) {
      params = withoutLimit(params);
    }

    let count = 0;

    while (true) {
      const response = await this.executor.execute({ ...request, params });
      const page = response.toPage();

      if (!page) {
        yield { kind: "raw", response };
        return;
      }

      count += page.data.length;

      let items = [...page.data];
      if (limit.kind === "bounded" && count >= limit.count) {
        items = items.slice(0, limit.count - (count - page.data.length));
      }

      yield { kind: "page", items, response };

      if (
        limit.kind === "unbounded" ||
        (limit.kind === "bounded" && count >= limit.count) ||
        page.nextCursor === null
      ) {
        return;
      }

      params = { ...params, cursor: page.nextCursor };
    }
  }
}
