/**
 * Error taxonomy for stack bring-up.
 *
 * Every error names the service or bootstrap step it concerns (`subject`) and
 * carries an operator-facing remediation `hint`. Callers branch on `kind`.
 */

export type StackErrorKind =
  | "CONFIGURATION"
  | "CYCLE"
  | "PROBE_TIMEOUT"
  | "PROBE_UNHEALTHY"
  | "SERVICE_START"
  | "BOOTSTRAP_STEP"
  | "RUNTIME_UNAVAILABLE"
  | "CONCURRENT_RUN"
  | "UNKNOWN_SERVICE"
  | "CANCELLED";

export abstract class StackError extends Error {
  public abstract readonly kind: StackErrorKind;

  constructor(
    message: string,
    public readonly subject: string,
    public readonly hint: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export const isStackError = (value: unknown): value is StackError => value instanceof StackError;

export class ConfigurationError extends StackError {
  public override readonly name = "ConfigurationError";
  public readonly kind = "CONFIGURATION";

  constructor(
    message: string,
    public readonly missingKeys: readonly string[] = [],
    public readonly placeholderKeys: readonly string[] = [],
    subject = "configuration",
  ) {
    super(
      message,
      subject,
      "Set every required variable in the env file and replace placeholder values before starting the stack",
    );
  }
}

export class CycleError extends StackError {
  public override readonly name = "CycleError";
  public readonly kind = "CYCLE";

  constructor(
    /** Services that could not be scheduled. */
    public readonly unscheduled: readonly string[],
    /** One concrete dependency cycle, first service repeated at the end. */
    public readonly cycle: readonly string[],
  ) {
    super(
      `Dependency cycle detected: ${cycle.join(" -> ")}`,
      cycle[0] ?? unscheduled[0] ?? "dependency-graph",
      "Remove one of the dependsOn edges in the cycle from the stack definition",
    );
  }
}

export class ProbeTimeoutError extends StackError {
  public override readonly name = "ProbeTimeoutError";
  public readonly kind = "PROBE_TIMEOUT";

  constructor(
    service: string,
    public readonly timeoutMs: number,
    public readonly lastState: string,
  ) {
    super(
      `${service} did not become healthy within ${timeoutMs}ms (last state ${lastState})`,
      service,
      `Inspect the service logs (stackctl logs ${service}) or raise its timeoutMs`,
    );
  }
}

export class ProbeUnhealthyError extends StackError {
  public override readonly name = "ProbeUnhealthyError";
  public readonly kind = "PROBE_UNHEALTHY";

  constructor(
    service: string,
    public readonly detail?: string,
  ) {
    super(
      `${service} reported unhealthy${detail ? `: ${detail}` : ""}`,
      service,
      `Check stackctl logs ${service}, then stackctl restart ${service}`,
    );
  }
}

export class ServiceStartError extends StackError {
  public override readonly name = "ServiceStartError";
  public readonly kind = "SERVICE_START";

  constructor(service: string, detail: string, cause?: unknown) {
    super(
      `Failed to start ${service}: ${detail}`,
      service,
      `Verify the compose service definition for ${service} and that its image is available locally`,
      cause,
    );
  }
}

export type BootstrapPhase = "lock" | "precondition" | "check" | "action" | "postcondition" | "reset";

export class BootstrapStepError extends StackError {
  public override readonly name = "BootstrapStepError";
  public readonly kind = "BOOTSTRAP_STEP";

  constructor(
    step: string,
    public readonly phase: BootstrapPhase,
    detail: string,
    public readonly code?: string,
  ) {
    super(
      `Bootstrap step ${step} failed during ${phase}: ${detail}`,
      step,
      phase === "precondition"
        ? "Re-run the bring-up; earlier steps converge on re-run"
        : "Fix the reported database error and re-run; completed steps are safe to repeat, or run stackctl repair with no clients connected",
    );
  }
}

export class RuntimeUnavailableError extends StackError {
  public override readonly name = "RuntimeUnavailableError";
  public readonly kind = "RUNTIME_UNAVAILABLE";

  constructor(detail: string, cause?: unknown) {
    super(
      `Container runtime is unreachable: ${detail}`,
      "runtime",
      "Start the Docker daemon and make sure the current user can run docker commands",
      cause,
    );
  }
}

export class ConcurrentRunError extends StackError {
  public override readonly name = "ConcurrentRunError";
  public readonly kind = "CONCURRENT_RUN";

  constructor(operation: string) {
    super(
      `Another ${operation} is already running`,
      operation,
      `Wait for the running ${operation} to finish before starting another`,
    );
  }
}

export class UnknownServiceError extends StackError {
  public override readonly name = "UnknownServiceError";
  public readonly kind = "UNKNOWN_SERVICE";

  constructor(service: string, available: readonly string[]) {
    super(
      `Unknown service: ${service}`,
      service,
      `Available services: ${available.join(", ")}`,
    );
  }
}

export class BringUpCancelledError extends StackError {
  public override readonly name = "BringUpCancelledError";
  public readonly kind = "CANCELLED";

  constructor(pending: readonly string[]) {
    super(
      `Bring-up interrupted${pending.length > 0 ? ` while waiting for ${pending.join(", ")}` : ""}`,
      pending[0] ?? "bring-up",
      "Services already started keep running; re-run stackctl up to continue",
    );
  }
}
