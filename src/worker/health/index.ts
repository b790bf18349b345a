export { DEFAULT_HTTP_TIMEOUT_MS, createProbe, type FetchFn, type Probe, type ProbeDeps } from "./probes";
export { waitForHealthy, type WaitOptions, type WaitOutcome } from "./wait-policy";
