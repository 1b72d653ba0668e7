/** Base class for errors raised by the framework itself rather than by function code. */
export class NimbusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NimbusError";
  }
}

/** The application is wired up in a way that cannot run: bad markers, names or settings. */
export class ConfigurationError extends NimbusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type DependencyViolation = {
  functionName: string;
  dependency: string;
  parameter: string;
};

/** Every unsatisfiable constructor dependency found while building the application. */
export class DependencyValidationError extends NimbusError {
  constructor(public readonly violations: readonly DependencyViolation[]) {
    super(
      "Unresolvable function dependencies:\n" +
        violations
          .map((v) => `  ${v.functionName} requires ${v.dependency} (parameter '${v.parameter}')`)
          .join("\n") +
        "\nRegister each missing service on builder.services.",
    );
    this.name = "DependencyValidationError";
  }
}

export type InvocationStage = "resolve" | "bind" | "invoke" | "serialize";

/** An unexpected failure while dispatching a request to a function. */
export class FunctionInvocationError extends NimbusError {
  constructor(
    public readonly functionName: string,
    public readonly stage: InvocationStage,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${functionName} failed during ${stage}: ${detail}`, { cause });
    this.name = "FunctionInvocationError";
  }
}

export type DeploymentStage = "prerequisites" | "synth" | "package" | "deploy" | "preview" | "destroy";

/** A deploy pipeline step failed. Never recovered from. */
export class DeploymentError extends NimbusError {
  constructor(
    public readonly stage: DeploymentStage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${stage}] ${message}`, options);
    this.name = "DeploymentError";
  }
}
