export type { EndpointSpec, EndpointOptions, HttpMethod, Params, Headers, RequestOptions } from "./types/endpoint";
export type { Limit, ResponsePage, PageHandler } from "./types/page";
export type { Result, Ok as OkResult, Err as ErrResult } from "./types/result";
export { Ok, Err, isOk, isErr, unwrap } from "./utils/result";

export {
  DefinitionError,
  TransportError,
  ServerError,
  InvalidParamsError,
  ResponseShapeError,
  ConfigurationError,
} from "./errors";

export type { ClientConfig, ClientConfigInput } from "./config";
export { ClientConfigSchema, parseClientConfig, loadConfigFromEnv } from "./config";

export type { ClientOptions } from "./client";
export { Client, setDefaultClient, getDefaultClient, clearDefaultClient } from "./client";

export type { Transport, TransportRequest, TransportResponse } from "./transport/Transport";
export type { AxiosTransportOptions } from "./transport/axios/AxiosTransport";
export { AxiosTransport } from "./transport/axios/AxiosTransport";

export { ResponseHash } from "./response/ResponseHash";
export { RequestExecutor } from "./request/executor";
export type { RequestExecutorOptions } from "./request/executor";
export { Paginator } from "./request/paginator";
export { parseLimit, MAX_SERVER_PAGE_SIZE } from "./request/limit";

export { resourceName, resourceRoot, buildPath } from "./endpoint/url";
export { defineEndpointSpec, tryDefineEndpointSpec } from "./endpoint/spec";

export type { BoundOperation, RootOperation, IdOperation } from "./resource/operation";
export { ResourceRegistrar } from "./resource/registrar";
export type { ResourceType, ResourceInstance, ResourceDefinition } from "./resource/defineResource";
export { defineResource } from "./resource/defineResource";

export * from "./resources";
