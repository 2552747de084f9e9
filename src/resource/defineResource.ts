import type { EndpointSpec } from "../types/endpoint";
import type { ClientConfigInput } from "../config";
import type { BoundOperation } from "./operation";
import { Client, getDefaultClient } from "../client";
import { ResourceRegistrar } from "./registrar";
import { resourceName, resourceRoot } from "../endpoint/url";
import { DefinitionError } from "../errors";

/**
 * A resource's operations bound to one client.
 */
export type ResourceInstance<O> = O & {
  readonly client: Client;
};

/**
 * A defined resource type.
 *
 * Its operations use the process default client; `withConfig` binds them to
 * another one.
 */
export type ResourceType<O> = O & {
  readonly resourceName: string;
  readonly resourceUrl: string;
  readonly endpoints: Readonly<Record<string, EndpointSpec>>;
  withConfig(config: Client | ClientConfigInput): ResourceInstance<O>;
};

export type ResourceDefinition<O> = (r: ResourceRegistrar) => O;

function bindOperations<O extends Record<string, BoundOperation>>(
  typeName: string,
  define: ResourceDefinition<O>,
  registrar: ResourceRegistrar,
): O {
  const operations = define(registrar);

  for (const [key, operation] of Object.entries(operations)) {
    if (operation.spec.operationName !== key) {
      throw new DefinitionError(
        `${typeName}.${key} is bound to endpoint "${operation.spec.operationName}"; keys must match endpoint names`,
      );
    }
  }

  const exposed = new Set(Object.keys(operations));
  const hidden = registrar.registeredNames().filter((name) => !exposed.has(name));
  if (hidden.length > 0) {
    throw new DefinitionError(`${typeName} registers endpoints it does not expose: ${hidden.join(", ")}`);
  }

  return operations;
}

/**
 * Define a resource type from its endpoint declarations.
 *
 * The resource root is derived from `typeName`: "EventSubscriptions" becomes
 * "/event_subscriptions". Endpoint shapes are validated here, so a bad
 * declaration fails when the module defining the resource is loaded.
 *
 * @example
 * ```typescript
 * export const Events = defineResource("Events", (r) => ({
 *   list: r.list(),
 *   retrieve: r.retrieve(),
 * }));
 *
 * setDefaultClient(new Client({ config: { baseUrl: "https://api.example.com" } }));
 * const recent = await Events.list({ limit: 20 });
 * const event = await Events.withConfig(otherClient).retrieve("event_123");
 * ```
 */
export function defineResource<O extends Record<string, BoundOperation>>(
  typeName: string,
  define: ResourceDefinition<O>,
): ResourceType<O> {
  const name = resourceName(typeName);
  const root = resourceRoot(name);

  const registrar = new ResourceRegistrar(root, getDefaultClient);
  const operations = bindOperations(typeName, define, registrar);

  return Object.assign(operations, {
    resourceName: name,
    resourceUrl: root,
    endpoints: registrar.endpoints(),
    withConfig(config: Client | ClientConfigInput): ResourceInstance<O> {
      const client = config instanceof Client ? config : new Client({ config });
      const instance = bindOperations(typeName, define, new ResourceRegistrar(root, () => client));
      return Object.assign(instance, { client });
    },
  });
}
