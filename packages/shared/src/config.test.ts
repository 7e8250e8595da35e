import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { getNumberEnv, loadRelayRuntimeConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const saved = { PORT: process.env.PORT, CAMRELAY_TEST_NUMBER: process.env.CAMRELAY_TEST_NUMBER };

function restore(name: keyof typeof saved): void {
  const value = saved[name];
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

afterEach(() => {
  restore("PORT");
  restore("CAMRELAY_TEST_NUMBER");
});

describe("getNumberEnv", () => {
  it("falls back when unset and parses when set", () => {
    delete process.env.CAMRELAY_TEST_NUMBER;
    assert.equal(getNumberEnv("CAMRELAY_TEST_NUMBER", 7), 7);

    process.env.CAMRELAY_TEST_NUMBER = "1500";
    assert.equal(getNumberEnv("CAMRELAY_TEST_NUMBER", 7), 1500);
  });

  it("rejects a non-numeric value as a configuration error", () => {
    process.env.CAMRELAY_TEST_NUMBER = "soon";
    assert.throws(
      () => getNumberEnv("CAMRELAY_TEST_NUMBER", 7),
      (error: unknown) =>
        error instanceof ConfigurationError && error.issues.join() === "CAMRELAY_TEST_NUMBER: not a number: soon"
    );
  });
});

describe("loadRelayRuntimeConfig", () => {
  it("uses the default port", () => {
    delete process.env.PORT;
    const runtime = loadRelayRuntimeConfig("camrelay", 3020);
    assert.equal(runtime.serviceName, "camrelay");
    assert.equal(runtime.port, 3020);
  });

  it("reports a malformed port as a configuration error", () => {
    process.env.PORT = "http";
    assert.throws(
      () => loadRelayRuntimeConfig("camrelay", 3020),
      (error: unknown) => error instanceof ConfigurationError && error.issues.join() === "PORT: not a number: http"
    );
  });
});
