import { existsSync, readFileSync } from "node:fs";

import { parse } from "dotenv";
import * as v from "valibot";

import { ConfigurationError } from "../errors";

import { type Env, envSchema } from "./schema";

export type EnvValues = Readonly<Record<string, string | undefined>>;

/**
 * Parse the variables this tool reads. Throws ConfigurationError listing every
 * invalid variable.
 */
export const parseEnv = (values: EnvValues): Env => {
  const result = v.safeParse(envSchema, values);
  if (!result.success) {
    const keys = result.issues.map((issue) => issue.path?.map((item) => String(item.key)).join(".") ?? "(root)");
    const details = result.issues.map(
      (issue, index) => `${keys[index] ?? "(root)"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Environment variable validation failed: ${details.join("; ")}`, keys);
  }
  return result.output;
};

/**
 * Read an env file with dotenv's parser. A missing file yields no values.
 */
export const readEnvFile = (path: string): Record<string, string> => {
  if (!existsSync(path)) {
    return {};
  }
  return parse(readFileSync(path));
};

/**
 * Values from the env file, overridden by the process environment.
 */
export const resolveEnvValues = (envFile: string | undefined, processEnv: EnvValues): EnvValues => ({
  ...(envFile ? readEnvFile(envFile) : {}),
  ...processEnv,
});

export type { Env } from "./schema";
