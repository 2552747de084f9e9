import { z } from "zod";
import type { Limit } from "../types/page";
import type { Params } from "../types/endpoint";
import type { Result } from "../types/result";
import { Ok, Err } from "../utils/result";
import { InvalidParamsError } from "../errors";

/**
 * Largest limit still forwarded to the server. Above it, or with "all", the
 * server's own page size applies and the limit is enforced client-side.
 */
export const MAX_SERVER_PAGE_SIZE = 100;

const LimitParamSchema = z.union([z.literal("all"), z.number().int().nonnegative()]).nullish();

export function parseLimit(params: Params | undefined): Result<Limit, InvalidParamsError> {
  const parsed = LimitParamSchema.safeParse(params?.limit);
  if (!parsed.success) {
    return Err(
      new InvalidParamsError(
        `limit must be "all" or a non-negative integer, got ${JSON.stringify(params?.limit)}`,
      ),
    );
  }

  if (parsed.data === undefined || parsed.data === null) {
    return Ok({ kind: "unbounded" });
  }
  if (parsed.data === "all") {
    return Ok({ kind: "all" });
  }
  return Ok({ kind: "bounded", count: parsed.data });
}

/**
 * Whether `limit` should be left out of the outgoing request.
 */
export function stripsLimit(limit: Limit): boolean {
  return limit.kind === "all" || (limit.kind === "bounded" && limit.count > MAX_SERVER_PAGE_SIZE);
}
