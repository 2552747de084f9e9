/**
 * Endpoint registration for one resource type.
 *
 * @module registrar
 */

import type { EndpointOptions, EndpointSpec, HttpMethod } from "../types/endpoint";
import type { ResponseHash } from "../response/ResponseHash";
import type { Client } from "../client";
import type { IdOperation, Invoke, RootOperation } from "./operation";
import { idOperation, rootOperation } from "./operation";
import { defineEndpointSpec } from "../endpoint/spec";
import { DefinitionError } from "../errors";

/**
 * Property names a resource type uses for itself.
 */
export const RESERVED_OPERATION_NAMES: readonly string[] = [
  "client",
  "endpoints",
  "resourceName",
  "resourceUrl",
  "withConfig",
];

const collect: Invoke<unknown[]> = (client, request) => client.paginator.collect(request);
const execute: Invoke<ResponseHash> = (client, request) => client.executor.execute(request);

/**
 * Declares the endpoints of a resource and generates an operation for each.
 *
 * Handed to the `defineResource` callback. Each call validates the endpoint
 * shape (throwing DefinitionError) and records it under its name.
 *
 * @example
 * ```typescript
 * const Accounts = defineResource("Accounts", (r) => ({
 *   create: r.create(),
 *   list: r.list(),
 *   retrieve: r.retrieve(),
 *   // POST /accounts/{id}/close
 *   close: r.endpoint("close", "POST", { id: true, pagination: false }),
 * }));
 * ```
 */
export class ResourceRegistrar {
  private readonly registered = new Map<string, EndpointSpec>();

  constructor(
    private readonly root: string,
    private readonly resolveClient: () => Client,
  ) {}

  endpoint(
    name: string,
    method: HttpMethod,
    options: EndpointOptions<true, true>,
  ): IdOperation<unknown[]>;
  endpoint(
    name: string,
    method: HttpMethod,
    options: EndpointOptions<true, false>,
  ): IdOperation<ResponseHash>;
  endpoint(
    name: string,
    method: HttpMethod,
    options: EndpointOptions<false, true>,
  ): RootOperation<unknown[]>;
  endpoint(
    name: string,
    method: HttpMethod,
    options: EndpointOptions<false, false>,
  ): RootOperation<ResponseHash>;
  endpoint(
    name: string,
    method: HttpMethod,
    options: EndpointOptions<boolean, boolean>,
  ):
    | IdOperation<unknown[]>
    | IdOperation<ResponseHash>
    | RootOperation<unknown[]>
    | RootOperation<ResponseHash> {
    if (RESERVED_OPERATION_NAMES.includes(name)) {
      throw new DefinitionError(`"${name}" is reserved and cannot name an endpoint`);
    }
    if (this.registered.has(name)) {
      throw new DefinitionError(`Endpoint "${name}" is already registered on ${this.root}`);
    }

    const spec = defineEndpointSpec(name, method, options);
    this.registered.set(name, spec);

    const { root, resolveClient } = this;
    if (spec.requiresId) {
      return spec.paginated
        ? idOperation({ root, spec, resolveClient, invoke: collect })
        : idOperation({ root, spec, resolveClient, invoke: execute });
    }
    return spec.paginated
      ? rootOperation({ root, spec, resolveClient, invoke: collect })
      : rootOperation({ root, spec, resolveClient, invoke: execute });
  }

  // Shortcuts for the endpoints nearly every resource has.

  /** POST to the resource root. */
  create(): RootOperation<ResponseHash> {
    return this.endpoint("create", "POST", { to: [], id: false, pagination: false });
  }

  /** Paginated GET on the resource root. */
  list(): RootOperation<unknown[]> {
    return this.endpoint("list", "GET", { to: [], id: false, pagination: true });
  }

  /** PATCH on `root/{id}`. */
  update(): IdOperation<ResponseHash> {
    return this.endpoint("update", "PATCH", { to: [], id: true, pagination: false });
  }

  /** GET on `root/{id}`. */
  retrieve(): IdOperation<ResponseHash> {
    return this.endpoint("retrieve", "GET", { to: [], id: true, pagination: false });
  }

  registeredNames(): string[] {
    return [...this.registered.keys()];
  }

  endpoints(): Readonly<Record<string, EndpointSpec>> {
    return Object.freeze(Object.fromEntries(this.registered));
  }
}
