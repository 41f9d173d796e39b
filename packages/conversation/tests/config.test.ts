import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@agent-ledger/stream-client";
import { loadSessionConfig } from "../src/config.js";

const base = {
  AGENT_ENDPOINT: "https://agent.test/api/v2/agent:run",
  AGENT_TOKEN: "test-secret",
};

describe("loadSessionConfig", () => {
  it("applies defaults for everything optional", () => {
    expect(loadSessionConfig(base)).toEqual({
      endpoint: "https://agent.test/api/v2/agent:run",
      credentials: { token: "test-secret" },
      outputDir: "./runs",
      timeoutMs: 120_000,
      strict: false,
      retry: { maxRetries: 3 },
      logLevel: "info",
    });
  });

  it("reads every variable", () => {
    const config = loadSessionConfig({
      ...base,
      AGENT_TOKEN_TYPE: "KEYPAIR_JWT",
      AGENT_RUN_DIR: "/var/runs",
      AGENT_TIMEOUT_MS: "45000",
      AGENT_MAX_RETRIES: "0",
      AGENT_STRICT_DECODE: "Yes",
      LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      endpoint: base.AGENT_ENDPOINT,
      credentials: { token: "test-secret", scheme: "KEYPAIR_JWT" },
      outputDir: "/var/runs",
      timeoutMs: 45_000,
      strict: true,
      retry: { maxRetries: 0 },
      logLevel: "debug",
    });
  });

  it.each(["0", "false", "off", "nope"])("treats AGENT_STRICT_DECODE=%s as off", (value) => {
    expect(loadSessionConfig({ ...base, AGENT_STRICT_DECODE: value }).strict).toBe(false);
  });

  it("treats empty values as unset", () => {
    expect(loadSessionConfig({ ...base, AGENT_TIMEOUT_MS: "", AGENT_TOKEN_TYPE: "" })).toMatchObject({
      timeoutMs: 120_000,
      credentials: { token: "test-secret" },
    });
  });

  it("ignores unrelated variables", () => {
    expect(loadSessionConfig({ ...base, HOME: "/root", PATH: "/bin" }).endpoint).toBe(
      base.AGENT_ENDPOINT,
    );
  });

  it("lists missing required variables", () => {
    expect(() => loadSessionConfig({})).toThrow(
      "Invalid environment: AGENT_ENDPOINT: Required; AGENT_TOKEN: Required",
    );
  });

  it("rejects a non-positive timeout and a bad endpoint", () => {
    let caught: unknown;
    try {
      loadSessionConfig({ AGENT_ENDPOINT: "not a url", AGENT_TOKEN: "t", AGENT_TIMEOUT_MS: "0" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ kind: "ConfigurationError" });
    expect(String(caught)).toContain("AGENT_ENDPOINT: Invalid url");
    expect(String(caught)).toContain("AGENT_TIMEOUT_MS: Number must be greater than 0");
  });

  it("accepts the longest timeout a timer supports and rejects anything longer", () => {
    expect(loadSessionConfig({ ...base, AGENT_TIMEOUT_MS: "2147483647" }).timeoutMs).toBe(
      2_147_483_647,
    );
    expect(() => loadSessionConfig({ ...base, AGENT_TIMEOUT_MS: "3000000000" })).toThrow(
      "Invalid environment: AGENT_TIMEOUT_MS: Number must be less than or equal to 2147483647",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadSessionConfig({ ...base, LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
  });
});
