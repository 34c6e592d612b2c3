export type ExecutionErrorType =
  | "TemplateNotFoundError"
  | "UnauthorizedTableError"
  | "MissingTimeFilterError"
  | "QueryTimeoutError"
  | "QueryExecutionError";

export type PipelineErrorType =
  | "CapabilityError"
  | "ConsistencyError"
  | "ResolutionError"
  | "TypeCoercionError"
  | "DecompositionError"
  | "TraceabilityError"
  | ExecutionErrorType;

export type ErrorContext = Record<string, string | number | boolean | null | string[]>;

export class PipelineError extends Error {
  type: PipelineErrorType;
  context: ErrorContext;

  constructor(type: PipelineErrorType, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = type;
    this.type = type;
    this.context = context;
  }
}

export class CapabilityError extends PipelineError {
  constructor(subject: string, reason: string, missingFields: string[]) {
    super("CapabilityError", `${subject} is not supported: ${reason}`, { subject, reason, missing_fields: missingFields });
  }
}

// Raised internally while repairing time fields; the Arbiter turns it into an assumption.
export class ConsistencyError extends PipelineError {
  constructor(message: string, context: ErrorContext = {}) {
    super("ConsistencyError", message, context);
  }
}

export class ResolutionError extends PipelineError {
  constructor(intent: string) {
    super("ResolutionError", `No execution mapping registered for intent "${intent}"`, { intent });
  }
}

export class TypeCoercionError extends PipelineError {
  constructor(field: string, received: string, expected: string) {
    super("TypeCoercionError", `Cannot read ${field}="${received}" as ${expected}`, { field, received, expected });
  }
}

export class DecompositionError extends PipelineError {
  constructor(term: string, denominator: string) {
    super("DecompositionError", `Term ${term} is undefined: ${denominator} is zero`, { term, denominator });
  }
}

// An answer value that does not resolve to a row or tree node computed in this turn.
export class TraceabilityError extends PipelineError {
  constructor(source: string, reason: string) {
    super("TraceabilityError", `Untraceable value at ${source}: ${reason}`, { source, reason });
  }
}

/**
 * Failures raised at the guarded query boundary. Each carries the template key so the
 * executor can report which template failed without exposing storage internals.
 */
export class ExecutionError extends PipelineError {
  kind: ExecutionErrorType;
  templateKey: string;

  constructor(kind: ExecutionErrorType, templateKey: string, message: string, context: ErrorContext = {}) {
    super(kind, message, { template_key: templateKey, ...context });
    this.kind = kind;
    this.templateKey = templateKey;
  }
}

export class TemplateNotFoundError extends ExecutionError {
  constructor(templateKey: string) {
    super("TemplateNotFoundError", templateKey, `Query template "${templateKey}" is not registered`);
  }
}

export class UnauthorizedTableError extends ExecutionError {
  constructor(templateKey: string, tables: string[]) {
    super("UnauthorizedTableError", templateKey, `Query "${templateKey}" references tables outside the allow-list: ${tables.join(", ")}`, {
      tables,
    });
  }
}

export class MissingTimeFilterError extends ExecutionError {
  constructor(templateKey: string, table: string) {
    super("MissingTimeFilterError", templateKey, `Query "${templateKey}" reads ${table} without a concrete date filter`, { table });
  }
}

export class QueryTimeoutError extends ExecutionError {
  constructor(templateKey: string, timeoutMs: number) {
    super("QueryTimeoutError", templateKey, `Query "${templateKey}" exceeded ${timeoutMs}ms; try a narrower time range`, {
      timeout_ms: timeoutMs,
    });
  }
}

export class QueryExecutionError extends ExecutionError {
  constructor(templateKey: string, message: string) {
    super("QueryExecutionError", templateKey, message);
  }
}
