/**
 * Navigable wrapper around a decoded response body.
 *
 * @module ResponseHash
 */

import { z } from "zod";
import type { TransportResponse } from "../transport/Transport";
import type { ResponsePage } from "../types/page";
import { ResponseShapeError } from "../errors";

const PageEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
  next_cursor: z.unknown(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decoded response body with key lookup, plus the transport response it came from.
 *
 * @example
 * ```typescript
 * const res = await executor.execute({ method: "GET", path: "/events" });
 * res.get("next_cursor"); // => "cursor_abc" or null
 * const page = res.toPage(); // => { data: [...], nextCursor: "cursor_abc" }
 * ```
 */
export class ResponseHash {
  constructor(
    public readonly body: unknown,
    public readonly response?: TransportResponse,
  ) {}

  /**
   * HTTP status of the underlying response, when one is attached.
   */
  get status(): number | undefined {
    return this.response?.status;
  }

  get(key: string): unknown {
    return isRecord(this.body) ? this.body[key] : undefined;
  }

  has(key: string): boolean {
    return isRecord(this.body) && Object.prototype.hasOwnProperty.call(this.body, key);
  }

  /**
   * Read the body as a page.
   *
   * Returns undefined when `data` is missing or null, which is how a
   * non-paginated endpoint answers. Throws ResponseShapeError when `data` is
   * present but not an array.
   */
  toPage(): ResponsePage | undefined {
    if (this.get("data") == null) {
      return undefined;
    }

    const parsed = PageEnvelopeSchema.safeParse(this.body);
    if (!parsed.success) {
      const message = parsed.error.errors
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ");
      throw new ResponseShapeError(`Malformed page: ${message}`);
    }

    return {
      data: parsed.data.data,
      nextCursor: parsed.data.next_cursor ?? null,
    };
  }

  toJSON(): unknown {
    return this.body;
  }
}
