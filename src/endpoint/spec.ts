import type { EndpointOptions, EndpointSpec, HttpMethod } from "../types/endpoint";
import type { Result } from "../types/result";
import { Ok, Err, unwrap } from "../utils/result";
import { DefinitionError } from "../errors";

const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE"];

/**
 * Validate an endpoint declaration and build its frozen spec.
 */
export function tryDefineEndpointSpec<TRequiresId extends boolean, TPaginated extends boolean>(
  operationName: string,
  httpMethod: HttpMethod,
  options: EndpointOptions<TRequiresId, TPaginated>,
): Result<EndpointSpec<TRequiresId, TPaginated>, DefinitionError> {
  if (operationName.length === 0) {
    return Err(new DefinitionError("Endpoint name must not be empty"));
  }
  if (!HTTP_METHODS.includes(httpMethod)) {
    return Err(new DefinitionError(`Unsupported HTTP method for ${operationName}: ${httpMethod}`));
  }

  const to = options.to ?? operationName;
  const urlSegments: string[] = typeof to === "string" ? [to] : [...to];

  if (urlSegments.length > 2) {
    return Err(new DefinitionError(`Invalid \`to\` for ${operationName}. Max of 2 elements allowed`));
  }
  if (urlSegments.length > 1 && !options.id) {
    return Err(
      new DefinitionError(`${operationName} takes no id, so \`to\` may hold one segment at most`),
    );
  }
  if (urlSegments.some((segment) => segment.length === 0 || segment.includes("/"))) {
    return Err(
      new DefinitionError(`Path segments of ${operationName} must be non-empty and contain no "/"`),
    );
  }

  return Ok(
    Object.freeze({
      operationName,
      httpMethod,
      urlSegments: Object.freeze(urlSegments),
      requiresId: options.id,
      paginated: options.pagination,
    }),
  );
}

export function defineEndpointSpec<TRequiresId extends boolean, TPaginated extends boolean>(
  operationName: string,
  httpMethod: HttpMethod,
  options: EndpointOptions<TRequiresId, TPaginated>,
): EndpointSpec<TRequiresId, TPaginated> {
  return unwrap(tryDefineEndpointSpec(operationName, httpMethod, options));
}
