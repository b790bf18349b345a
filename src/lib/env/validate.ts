/**
 * Pre-flight check of the variables the stack's services need.
 */

import { ConfigurationError } from "../errors";

import type { EnvValues } from "./env";
import { OPTIONAL_KEYS, PLACEHOLDER_VALUES, REQUIRED_KEYS } from "./schema";

export interface ConfigValidation {
  ok: boolean;
  missingKeys: readonly string[];
  placeholderKeys: readonly string[];
  /** Optional variables that are unset; informational only. */
  optionalMissing: readonly string[];
}

export interface ConfigSource {
  validate: () => ConfigValidation;
  /** Throws ConfigurationError unless `validate()` passes. */
  assertValid: () => void;
  get: (key: string) => string | undefined;
}

export const createConfigSource = (values: EnvValues): ConfigSource => {
  const validate = (): ConfigValidation => {
    const missingKeys: string[] = [];
    const placeholderKeys: string[] = [];

    for (const key of REQUIRED_KEYS) {
      const value = values[key];
      if (value === undefined) {
        missingKeys.push(key);
      } else if (PLACEHOLDER_VALUES.has(value.trim())) {
        placeholderKeys.push(key);
      }
    }

    const optionalMissing = OPTIONAL_KEYS.filter((key) => {
      const value = values[key];
      return value === undefined || value.trim() === "";
    });

    return {
      ok: missingKeys.length === 0 && placeholderKeys.length === 0,
      missingKeys,
      placeholderKeys,
      optionalMissing,
    };
  };

  return {
    validate,
    assertValid: () => {
      const validation = validate();
      if (validation.ok) {
        return;
      }
      const parts = [
        ...(validation.missingKeys.length > 0 ? [`missing ${validation.missingKeys.join(", ")}`] : []),
        ...(validation.placeholderKeys.length > 0
          ? [`placeholder values in ${validation.placeholderKeys.join(", ")}`]
          : []),
      ];
      throw new ConfigurationError(
        `Environment is not ready: ${parts.join("; ")}`,
        validation.missingKeys,
        validation.placeholderKeys,
      );
    },
    get: (key) => values[key],
  };
};
