/**
 * Environment helper tests.
 *
 * Run: node --import tsx --test src/config/env.test.ts
 */

import { strict as assert } from "node:assert";
import { afterEach, describe, it } from "node:test";

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
  requireEnv,
} from "./env.js";

const KEY = "RESEARCH_ENV_TEST_VALUE";

afterEach(() => {
  delete process.env[KEY];
});

describe("requireEnv", () => {
  it("returns the value when set", () => {
    process.env[KEY] = "present";
    assert.equal(requireEnv(KEY), "present");
  });

  it("throws ConfigError when empty", () => {
    process.env[KEY] = "";
    assert.throws(() => requireEnv(KEY), ConfigError);
  });
});

describe("optional helpers", () => {
  it("falls back to the default when unset", () => {
    assert.equal(optionalEnv(KEY, "fallback"), "fallback");
    assert.equal(optionalEnvInt(KEY, 7), 7);
    assert.equal(optionalEnvBool(KEY, true), true);
    assert.equal(maybeEnv(KEY), undefined);
  });

  it("parses positive integers", () => {
    process.env[KEY] = "12";
    assert.equal(optionalEnvInt(KEY, 1), 12);
  });

  it("rejects zero and non-integers", () => {
    process.env[KEY] = "0";
    assert.throws(() => optionalEnvInt(KEY, 1), /must be a positive integer, got: 0/);
    process.env[KEY] = "2.5";
    assert.throws(() => optionalEnvInt(KEY, 1), ConfigError);
  });

  it("recognizes boolean spellings case-insensitively", () => {
    process.env[KEY] = "YES";
    assert.equal(optionalEnvBool(KEY, false), true);
    process.env[KEY] = "0";
    assert.equal(optionalEnvBool(KEY, true), false);
    process.env[KEY] = "maybe";
    assert.throws(() => optionalEnvBool(KEY, true), ConfigError);
  });
});
