import type { Transport } from "./transport/Transport";
import type { ClientConfig, ClientConfigInput } from "./config";
import { parseClientConfig } from "./config";
import { AxiosTransport } from "./transport/axios/AxiosTransport";
import { RequestExecutor } from "./request/executor";
import { Paginator } from "./request/paginator";
import { unwrap } from "./utils/result";
import { ConfigurationError } from "./errors";

export interface ClientOptions {
  config: ClientConfigInput;
  /**
   * Transport to send requests through. Defaults to an AxiosTransport built
   * from `config`.
   */
  transport?: Transport;
}

/**
 * Connection settings plus the request pipeline built on them.
 *
 * @example
 * ```typescript
 * const client = new Client({
 *   config: { baseUrl: "https://api.example.com", apiKey: "test-secret" }
 * });
 * const events = await Events.withConfig(client).list({ limit: 10 });
 * ```
 */
export class Client {
  readonly config: ClientConfig;
  readonly transport: Transport;
  readonly executor: RequestExecutor;
  readonly paginator: Paginator;

  constructor(options: ClientOptions) {
    this.config = unwrap(parseClientConfig(options.config));
    this.transport = options.transport ?? new AxiosTransport(this.config);
    this.executor = new RequestExecutor(this.transport, {
      defaultHeaders: this.config.headers,
      debug: this.config.debug,
    });
    this.paginator = new Paginator(this.executor);
  }
}

let defaultClient: Client | null = null;

/**
 * Set the client used by type-level resource operations.
 *
 * Meant to be called once at startup; a second call throws.
 */
export function setDefaultClient(client: Client): void {
  if (defaultClient) {
    throw new ConfigurationError(
      "A default client is already set. Call clearDefaultClient() before replacing it.",
    );
  }
  defaultClient = client;
}

export function getDefaultClient(): Client {
  if (!defaultClient) {
    throw new ConfigurationError(
      "No default client set. Call setDefaultClient() or use Resource.withConfig().",
    );
  }
  return defaultClient;
}

export function clearDefaultClient(): void {
  defaultClient = null;
}
