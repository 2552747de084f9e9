/**
 * Helper functions for deriving resource roots and request paths.
 *
 * @module url
 */

import type { EndpointSpec } from "../types/endpoint";
import { InvalidParamsError } from "../errors";

/**
 * Split a PascalCase type name into space-separated words.
 *
 * @example
 * ```typescript
 * resourceName("EventSubscriptions")  // => "Event Subscriptions"
 * resourceName("Events")              // => "Events"
 * ```
 */
export function resourceName(typeName: string): string {
  return typeName.replace(/[A-Z]/g, (letter) => ` ${letter}`).trim();
}

/**
 * Get the root path of a resource from its display name.
 *
 * @example
 * ```typescript
 * resourceRoot("Event Subscriptions")  // => "/event_subscriptions"
 * resourceRoot("Events")               // => "/events"
 * ```
 */
export function resourceRoot(name: string): string {
  return `/${name.toLowerCase().replace(/ /g, "_")}`;
}

/**
 * Get the request path for one call of an endpoint.
 *
 * - no id: `root` or `root/segment0`
 * - id, no segments: `root/{id}`
 * - id, one segment: `root/{id}/segment0`
 * - id, two segments: `root/segment0/{id}/segment1`
 *
 * The id is inserted as given.
 *
 * @example
 * ```typescript
 * buildPath("/accounts", closeSpec, "account_123")  // => "/accounts/account_123/close"
 * buildPath("/events", listSpec)                    // => "/events"
 * ```
 */
export function buildPath(root: string, spec: EndpointSpec, id?: string): string {
  const segments = spec.urlSegments;

  if (!spec.requiresId) {
    return segments.length === 1 ? `${root}/${segments[0]}` : root;
  }

  if (typeof id !== "string" || id.length === 0) {
    throw new InvalidParamsError(
      `${spec.operationName} requires a non-empty string id as its first argument`,
    );
  }

  if (segments.length === 2) {
    return `${root}/${segments[0]}/${id}/${segments[1]}`;
  }
  if (segments.length === 1) {
    return `${root}/${id}/${segments[0]}`;
  }
  return `${root}/${id}`;
}
