export { type Env, type EnvValues, parseEnv, readEnvFile, resolveEnvValues } from "./env";
export { OPTIONAL_KEYS, PLACEHOLDER_VALUES, REQUIRED_KEYS, envSchema } from "./schema";
export { type ConfigSource, type ConfigValidation, createConfigSource } from "./validate";
