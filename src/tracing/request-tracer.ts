import { randomUUID } from "node:crypto";
import { CLIENT_START_TIME_PARAM, REQUEST_GUID_PARAM, RETRY_COUNT_PARAM } from "../constants.js";
import type { HttpRequest } from "../transport/types.js";
import type { StampOptions } from "./types.js";

/**
 * Stamps retry metadata onto the request's query string before each attempt.
 *
 * The receiving service uses `retryCount` to decide whether it needs to look up
 * an earlier run of the same call; plain first attempts skip that lookup.
 */
export class RequestTracer {
  constructor(private readonly generateId: () => string = randomUUID) {}

  /** Returns the request guid set on this attempt, if any */
  stamp(request: HttpRequest, options: StampOptions): string | undefined {
    const params = request.url.searchParams;

    if (options.retryCount > 0) {
      params.set(RETRY_COUNT_PARAM, String(options.retryCount));
      if (options.includeRetryParameters) {
        params.set(CLIENT_START_TIME_PARAM, String(options.clientStartTime));
      }
    }

    if (!options.includeRequestGuid) return undefined;

    const guid = this.generateId();
    params.set(REQUEST_GUID_PARAM, guid);
    return guid;
  }
}
