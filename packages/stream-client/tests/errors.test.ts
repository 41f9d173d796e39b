import { describe, it, expect } from "vitest";
import {
  AgentRunError,
  ConfigurationError,
  ConnectionError,
  DecodeError,
  ErrorKind,
  IncompleteToolCallError,
  NetworkError,
  PersistenceError,
  ProtocolError,
  RateLimitError,
  RunTimeoutError,
  UnexpectedEndOfStreamError,
} from "../src/types/errors.js";

describe("error hierarchy", () => {
  it("gives every error its kind and a shared base class", () => {
    const cases: Array<[AgentRunError, string]> = [
      [new ConnectionError("x"), ErrorKind.CONNECTION],
      [new DecodeError("x", { data: "" }), ErrorKind.DECODE],
      [new ProtocolError("x"), ErrorKind.PROTOCOL],
      [new IncompleteToolCallError(["a"]), ErrorKind.INCOMPLETE_TOOL_CALL],
      [new UnexpectedEndOfStreamError(), ErrorKind.UNEXPECTED_END_OF_STREAM],
      [new RunTimeoutError(10), ErrorKind.TIMEOUT],
      [new PersistenceError("x"), ErrorKind.PERSISTENCE],
      [new ConfigurationError("x"), ErrorKind.CONFIGURATION],
    ];
    for (const [error, kind] of cases) {
      expect(error).toBeInstanceOf(AgentRunError);
      expect(error).toBeInstanceOf(Error);
      expect(error.kind).toBe(kind);
    }
  });

  it("marks only transient connection failures as retryable", () => {
    expect(new NetworkError("reset").retryable).toBe(true);
    expect(new RateLimitError("slow").retryable).toBe(true);
    expect(new ConnectionError("other").retryable).toBe(false);
    expect(new ProtocolError("dup").retryable).toBe(false);
  });

  it("lists the open tool calls", () => {
    const error = new IncompleteToolCallError(["t1", "t2"]);
    expect(error.message).toBe("Final event received with open tool calls: t1, t2");
    expect(error.openToolCallIds).toEqual(["t1", "t2"]);
  });

  it("keeps the cause", () => {
    const cause = new Error("ECONNRESET");
    expect(new NetworkError("reset", { cause }).cause).toBe(cause);
  });

  it("sets the class name", () => {
    expect(new RunTimeoutError(5).name).toBe("RunTimeoutError");
    expect(new RunTimeoutError(5).message).toBe("Run exceeded its 5ms deadline");
  });
});
