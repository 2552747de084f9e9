import type { EndpointSpec, Headers, Params, RequestOptions } from "../types/endpoint";
import type { PageHandler } from "../types/page";
import type { ResponseHash } from "../response/ResponseHash";
import type { Client } from "../client";
import { buildPath } from "../endpoint/url";

/**
 * Anything generated from an EndpointSpec.
 */
export interface BoundOperation {
  readonly spec: EndpointSpec;
}

/**
 * Operation on the resource root (or a fixed segment below it).
 *
 * - `op(params?, headers?)` returns the collected items for a paginated
 *   endpoint, the response otherwise
 * - `op.eachPage(handler, params?, headers?)` streams pages to `handler`
 * - `op.pages(params?, headers?)` yields pages lazily
 */
export interface RootOperation<R> extends BoundOperation {
  (params?: Params, headers?: Headers): Promise<R>;
  eachPage(
    handler: PageHandler,
    params?: Params,
    headers?: Headers,
  ): Promise<ResponseHash | undefined>;
  pages(params?: Params, headers?: Headers): AsyncGenerator<unknown[], void, undefined>;
}

/**
 * Operation addressing one resource by id. Same shape as RootOperation with
 * the id as first argument everywhere.
 */
export interface IdOperation<R> extends BoundOperation {
  (id: string, params?: Params, headers?: Headers): Promise<R>;
  eachPage(
    id: string,
    handler: PageHandler,
    params?: Params,
    headers?: Headers,
  ): Promise<ResponseHash | undefined>;
  pages(
    id: string,
    params?: Params,
    headers?: Headers,
  ): AsyncGenerator<unknown[], void, undefined>;
}

/**
 * Performs one call of an operation once its request is built: collects
 * pages for paginated endpoints, executes a single request otherwise.
 */
export type Invoke<R> = (client: Client, request: RequestOptions) => Promise<R>;

export interface OperationBinding<R> {
  readonly root: string;
  readonly spec: EndpointSpec;
  readonly resolveClient: () => Client;
  readonly invoke: Invoke<R>;
}

export function rootOperation<R>(binding: OperationBinding<R>): RootOperation<R> {
  const { root, spec, resolveClient, invoke } = binding;

  const request = (params?: Params, headers?: Headers): RequestOptions => ({
    method: spec.httpMethod,
    path: buildPath(root, spec),
    params,
    headers,
  });

  const call = async (params?: Params, headers?: Headers): Promise<R> =>
    invoke(resolveClient(), request(params, headers));

  return Object.assign(call, {
    spec,
    eachPage: async (
      handler: PageHandler,
      params?: Params,
      headers?: Headers,
    ): Promise<ResponseHash | undefined> =>
      resolveClient().paginator.forEachPage(request(params, headers), handler),
    pages: async function* (
      params?: Params,
      headers?: Headers,
    ): AsyncGenerator<unknown[], void, undefined> {
      yield* resolveClient().paginator.pages(request(params, headers));
    },
  });
}

export function idOperation<R>(binding: OperationBinding<R>): IdOperation<R> {
  const { root, spec, resolveClient, invoke } = binding;

  const request = (id: string, params?: Params, headers?: Headers): RequestOptions => ({
    method: spec.httpMethod,
    path: buildPath(root, spec, id),
    params,
    headers,
  });

  const call = async (id: string, params?: Params, headers?: Headers): Promise<R> =>
    invoke(resolveClient(), request(id, params, headers));

  return Object.assign(call, {
    spec,
    eachPage: async (
      id: string,
      handler: PageHandler,
      params?: Params,
      headers?: Headers,
    ): Promise<ResponseHash | undefined> =>
      resolveClient().paginator.forEachPage(request(id, params, headers), handler),
    pages: async function* (
      id: string,
      params?: Params,
      headers?: Headers,
    ): AsyncGenerator<unknown[], void, undefined> {
      yield* resolveClient().paginator.pages(request(id, params, headers));
    },
  });
}
