import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigurationError } from "../errors";

import { parseEnv, readEnvFile, resolveEnvValues } from "./env";

describe("parseEnv", () => {
  it("should apply defaults", () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe("development");
    expect(env.POSTGRES_HOST).toBe("localhost");
    expect(env.POSTGRES_PORT).toBe(5432);
    expect(env.POSTGRES_USER).toBe("postgres");
    expect(env.STATUS_PORT).toBe(9400);
    expect(env.COMPOSE_FILE).toBe("docker-compose.yml");
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  it("should parse provided values", () => {
    const env = parseEnv({
      NODE_ENV: "production",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
      POSTGRES_PORT: "6543",
      POSTGRES_PASSWORD: "test-secret",
    });

    expect(env.NODE_ENV).toBe("production");
    expect(env.LOG_LEVEL).toBe("debug");
    expect(env.LOG_FORMAT).toBe("json");
    expect(env.POSTGRES_PORT).toBe(6543);
    expect(env.POSTGRES_PASSWORD).toBe("test-secret");
  });

  it("should fail when a port is not a number", () => {
    expect(() => parseEnv({ POSTGRES_PORT: "not-a-number" })).toThrow(ConfigurationError);
  });

  it("should fail on an unknown log level", () => {
    try {
      parseEnv({ LOG_LEVEL: "verbose" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.missingKeys).toEqual(["LOG_LEVEL"]);
      }
    }
  });
});

describe("env files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stack-env-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should read key value pairs", () => {
    const file = join(dir, ".env");
    writeFileSync(file, "JWT_SECRET=test-secret\n# comment\nSITE_URL=\"http://localhost:3000\"\n");

    expect(readEnvFile(file)).toEqual({ JWT_SECRET: "test-secret", SITE_URL: "http://localhost:3000" });
  });

  it("should treat a missing file as empty", () => {
    expect(readEnvFile(join(dir, "absent.env"))).toEqual({});
  });

  it("should let the process environment override the file", () => {
    const file = join(dir, ".env");
    writeFileSync(file, "POSTGRES_PORT=5432\nJWT_SECRET=from-file\n");

    const values = resolveEnvValues(file, { POSTGRES_PORT: "6543" });

    expect(values).toEqual({ POSTGRES_PORT: "6543", JWT_SECRET: "from-file" });
  });
});
