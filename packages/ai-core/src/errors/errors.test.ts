import { describe, expect, it } from "vitest";
import {
  CollaboratorError,
  ConfigurationError,
  isAdvisorError,
  isCollaboratorError,
  isConfigurationError,
  toAdvisorError,
} from "./errors";

describe("ConfigurationError", () => {
  it("is a non-retryable configuration failure", () => {
    const error = new ConfigurationError("MISSING_REQUIRED_PARAM", "query_requirement is empty", {
      advisor: "RetrievalAdvisor",
    });

    expect(error.name).toBe("ConfigurationError");
    expect(error.kind).toBe("configuration");
    expect(error.retryable).toBe(false);
    expect(isAdvisorError(error)).toBe(true);
    expect(isConfigurationError(error)).toBe(true);
    expect(isCollaboratorError(error)).toBe(false);
  });

  it("serializes to a response envelope", () => {
    const error = new ConfigurationError("INVALID_PARAM", "bad value", {
      advisor: "memory",
      details: { key: "size" },
    });

    expect(error.toResponse()).toEqual({
      error: {
        code: "INVALID_PARAM",
        kind: "configuration",
        message: "bad value",
        retryable: false,
        advisor: "memory",
        recovery: "Check the type of the advisor parameter.",
        details: { key: "size" },
      },
    });
  });
});

describe("CollaboratorError", () => {
  it("names the failing collaborator and keeps the cause", () => {
    const cause = new Error("connection refused");
    const error = new CollaboratorError("RETRIEVAL_FAILED", "retrieval", cause.message, { cause });

    expect(error.collaborator).toBe("retrieval");
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
    expect(error.recovery).toBe("The document store is unavailable. Please try again in a moment.");
  });
});

describe("toAdvisorError", () => {
  it("passes advisor errors through", () => {
    const original = new ConfigurationError("INVALID_REQUEST", "nothing to ask");

    expect(toAdvisorError(original, { code: "MODEL_CALL_FAILED", collaborator: "model" })).toBe(
      original
    );
  });

  it("wraps other throwables", () => {
    const wrapped = toAdvisorError("socket hang up", {
      code: "MODEL_CALL_FAILED",
      collaborator: "model",
    });

    expect(wrapped).toBeInstanceOf(CollaboratorError);
    expect(wrapped).toMatchObject({
      code: "MODEL_CALL_FAILED",
      message: "socket hang up",
      cause: "socket hang up",
    });
  });
});
