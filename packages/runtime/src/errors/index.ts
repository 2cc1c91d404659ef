export type OrchestratorErrorKind =
  | "validation"
  | "transient_provider"
  | "fatal_provider"
  | "tool_execution"
  | "iteration_budget_exceeded"
  | "execution_failure"
  | "cancelled"
  | "internal";

export interface StructuredError {
  kind: OrchestratorErrorKind;
  name: string;
  message: string;
  details: Record<string, unknown>;
}

export interface PlanIssue {
  code:
    | "empty_goal"
    | "unparsable_response"
    | "schema_mismatch"
    | "empty_plan"
    | "too_many_subtasks"
    | "duplicate_id"
    | "unknown_dependency"
    | "cycle";
  message: string;
  subtaskId?: string;
}

interface OrchestratorErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * 所有编排核心错误的基类，`kind` 决定重试与传播策略。
 */
export class OrchestratorError extends Error {
  public readonly kind: OrchestratorErrorKind;

  public readonly details: Record<string, unknown>;

  constructor(
    kind: OrchestratorErrorKind,
    message: string,
    options?: OrchestratorErrorOptions
  ) {
    super(
      message,
      options?.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = new.target.name;
    this.kind = kind;
    this.details = options?.details ?? {};
  }

  public toJSON(): StructuredError {
    return {
      kind: this.kind,
      name: this.name,
      message: this.message,
      details: this.details,
    };
  }
}

export class ValidationError extends OrchestratorError {
  constructor(message: string, options?: OrchestratorErrorOptions) {
    super("validation", message, options);
  }
}

export class PlanValidationError extends ValidationError {
  public readonly issues: PlanIssue[];

  constructor(issues: PlanIssue[], options?: { cause?: unknown }) {
    const summary =
      issues.length > 0
        ? issues.map((issue) => issue.message).join("; ")
        : "Plan rejected";
    super(`Invalid plan: ${summary}`, {
      ...options,
      details: { issues },
    });
    this.issues = issues;
  }
}

export class ToolRegistrationError extends ValidationError {}

export class TransientProviderError extends OrchestratorError {
  public readonly status: number | null;

  constructor(
    message: string,
    options?: OrchestratorErrorOptions & { status?: number }
  ) {
    super("transient_provider", message, {
      ...options,
      details: { ...(options?.details ?? {}), status: options?.status ?? null },
    });
    this.status = options?.status ?? null;
  }
}

export class FatalProviderError extends OrchestratorError {
  public readonly status: number | null;

  constructor(
    message: string,
    options?: OrchestratorErrorOptions & { status?: number }
  ) {
    super("fatal_provider", message, {
      ...options,
      details: { ...(options?.details ?? {}), status: options?.status ?? null },
    });
    this.status = options?.status ?? null;
  }
}

export class ToolExecutionError extends OrchestratorError {
  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super("tool_execution", message, { ...options, details: { toolName } });
  }
}

export class IterationBudgetExceededError extends OrchestratorError {
  constructor(maxIterations: number) {
    super(
      "iteration_budget_exceeded",
      `Task execution exceeded maximum iterations (${maxIterations})`,
      { details: { maxIterations } }
    );
  }
}

export class ExecutionFailure extends OrchestratorError {
  constructor(message: string, options?: OrchestratorErrorOptions) {
    super("execution_failure", message, options);
  }
}

export class CancelledError extends OrchestratorError {
  constructor(message = "Run cancelled") {
    super("cancelled", message);
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error ?? "Unknown failure");
}

export function toStructuredError(error: unknown): StructuredError {
  if (error instanceof OrchestratorError) {
    return error.toJSON();
  }
  return {
    kind: "internal",
    name: error instanceof Error ? error.name : "Error",
    message: toErrorMessage(error),
    details: {},
  };
}
