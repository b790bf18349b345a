import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../errors";

import { REQUIRED_KEYS } from "./schema";
import { createConfigSource } from "./validate";

const completeEnv = (): Record<string, string> =>
  Object.fromEntries(REQUIRED_KEYS.map((key) => [key, "test-secret"]));

describe("createConfigSource", () => {
  it("should pass when every required key holds a real value", () => {
    const validation = createConfigSource(completeEnv()).validate();

    expect(validation.ok).toBe(true);
    expect(validation.missingKeys).toEqual([]);
    expect(validation.placeholderKeys).toEqual([]);
  });

  it("should report missing required keys", () => {
    const { JWT_SECRET: _jwt, ANON_KEY: _anon, ...rest } = completeEnv();

    const validation = createConfigSource(rest).validate();

    expect(validation.ok).toBe(false);
    expect(validation.missingKeys).toEqual(["JWT_SECRET", "ANON_KEY"]);
  });

  it("should report placeholder values", () => {
    const validation = createConfigSource({
      ...completeEnv(),
      POSTGRES_PASSWORD: "change-me",
      VAULT_ENC_KEY: "your-value-here",
      DASHBOARD_PASSWORD: "",
    }).validate();

    expect(validation.ok).toBe(false);
    expect(validation.placeholderKeys).toEqual(["POSTGRES_PASSWORD", "DASHBOARD_PASSWORD", "VAULT_ENC_KEY"]);
  });

  it("should list unset optional keys without failing", () => {
    const validation = createConfigSource({ ...completeEnv(), SITE_URL: "http://localhost:3000", SMTP_HOST: "" }).validate();

    expect(validation.ok).toBe(true);
    expect(validation.optionalMissing).toEqual([
      "API_EXTERNAL_URL",
      "SUPABASE_PUBLIC_URL",
      "OPENAI_API_KEY",
      "SMTP_HOST",
      "SMTP_PORT",
      "SMTP_USER",
      "SMTP_PASS",
    ]);
  });

  it("should throw a ConfigurationError carrying the offending keys", () => {
    const source = createConfigSource({ ...completeEnv(), JWT_SECRET: "change-me" });

    try {
      source.assertValid();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe("Environment is not ready: placeholder values in JWT_SECRET");
        expect(error.placeholderKeys).toEqual(["JWT_SECRET"]);
      }
    }
  });
});
