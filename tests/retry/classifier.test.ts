import { describe, expect, it } from "vitest";
import { InvalidStateError, RestRequestError, RestRequestErrorCode } from "../../src/errors.js";
import {
  StatusReason,
  classifyFault,
  classifyStatus,
  isInvalidState,
  isRetryableStatus,
} from "../../src/retry/classifier.js";
import { networkError } from "../helpers/fixtures.js";

const SERVER_ERRORS = Array.from({ length: 100 }, (_, i) => 500 + i);

describe("classifyStatus", () => {
  it("classifies every 5xx code as a retryable server error", () => {
    for (const status of SERVER_ERRORS) {
      expect(classifyStatus(status)).toEqual({ retryable: true, reason: StatusReason.SERVER_ERROR });
    }
  });

  it("classifies 408 as retryable request timeout", () => {
    expect(classifyStatus(408)).toEqual({ retryable: true, reason: StatusReason.REQUEST_TIMEOUT });
  });

  it("classifies 403 as retryable by default", () => {
    expect(classifyStatus(403)).toEqual({ retryable: true, reason: StatusReason.FORBIDDEN });
  });

  it.each([200, 201, 204, 301, 400, 401, 404, 429, 499, 600])("classifies %i as terminal", (status) => {
    expect(classifyStatus(status)).toEqual({ retryable: false, reason: StatusReason.TERMINAL });
  });

  it("stops retrying 403 when it is left out of the configured codes", () => {
    expect(classifyStatus(403, [408]).retryable).toBe(false);
    expect(classifyStatus(408, [408]).retryable).toBe(true);
  });

  it("retries any extra configured code", () => {
    expect(classifyStatus(429, [408, 429])).toEqual({ retryable: true, reason: StatusReason.CONFIGURED });
  });

  it("keeps 5xx retryable with an empty code list", () => {
    expect(classifyStatus(502, []).retryable).toBe(true);
  });
});

describe("isRetryableStatus", () => {
  it("mirrors classifyStatus", () => {
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
    expect(isRetryableStatus(403, [])).toBe(false);
  });
});

describe("classifyFault", () => {
  it("classifies InvalidStateError as fatal", () => {
    expect(classifyFault(new InvalidStateError("closed"))).toEqual({ retryable: false, errorType: "INVALID_STATE" });
  });

  it("classifies an ERR_INVALID_STATE code as fatal", () => {
    expect(classifyFault(networkError("ERR_INVALID_STATE", "Invalid state")).retryable).toBe(false);
  });

  it("classifies RestRequestError(INVALID_STATE) as fatal", () => {
    const err = new RestRequestError(RestRequestErrorCode.INVALID_STATE, "shut down");
    expect(classifyFault(err).retryable).toBe(false);
  });

  it("classifies network errors by code", () => {
    expect(classifyFault(networkError("ECONNRESET"))).toEqual({ retryable: true, errorType: "ECONNRESET" });
    expect(classifyFault(networkError("EAI_AGAIN"))).toEqual({ retryable: true, errorType: "EAI_AGAIN" });
  });

  it("reads the code from a wrapped cause", () => {
    const err = new TypeError("fetch failed", { cause: networkError("ECONNREFUSED", "connect ECONNREFUSED") });
    expect(classifyFault(err)).toEqual({ retryable: true, errorType: "ECONNREFUSED" });
  });

  it("classifies timeout and abort errors as TIMEOUT", () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    expect(classifyFault(timeout)).toEqual({ retryable: true, errorType: "TIMEOUT" });
  });

  it("treats unknown faults as retryable", () => {
    expect(classifyFault(new Error("something odd"))).toEqual({ retryable: true, errorType: "TRANSPORT_FAULT" });
  });
});

describe("isInvalidState", () => {
  it("returns false for network errors", () => {
    expect(isInvalidState(networkError("ECONNRESET"))).toBe(false);
    expect(isInvalidState(new RestRequestError(RestRequestErrorCode.NETWORK_ERROR, "timeout"))).toBe(false);
  });
});
