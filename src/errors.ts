export const ERROR_GENERATION_FAILED = "E-GEN-FAILED" as const;
export const ERROR_SOLVER_INFEASIBLE = "E-SOLVER-INFEASIBLE" as const;
export const ERROR_ENCODING = "E-ENCODING" as const;
export const ERROR_PARSE = "E-PARSE" as const;
export const ERROR_IO_TRANSIENT = "E-IO-TRANSIENT" as const;
export const ERROR_CONFIG = "E-CONFIG" as const;

export type GraphBenchErrorCode =
  | typeof ERROR_GENERATION_FAILED
  | typeof ERROR_SOLVER_INFEASIBLE
  | typeof ERROR_ENCODING
  | typeof ERROR_PARSE
  | typeof ERROR_IO_TRANSIENT
  | typeof ERROR_CONFIG;

/** Base class of every coded error raised by the benchmark pipeline. */
export class GraphBenchError extends Error {
  public readonly code: GraphBenchErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: GraphBenchErrorCode, message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(message, { cause: options.cause });
    this.name = "GraphBenchError";
    this.code = code;
    this.details = options.details;
  }
}

/** No acceptable instance could be produced within the retry budget. */
export class GenerationFailure extends GraphBenchError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(ERROR_GENERATION_FAILED, message, options);
    this.name = "GenerationFailure";
  }
}

/** The graph lacks the structure the family's solver requires. */
export class SolverInfeasible extends GraphBenchError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(ERROR_SOLVER_INFEASIBLE, message, options);
    this.name = "SolverInfeasible";
  }
}

export class EncodingError extends GraphBenchError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(ERROR_ENCODING, message, options);
    this.name = "EncodingError";
  }
}

/** Answer text carried no structure of the expected shape. */
export class ParseFailure extends GraphBenchError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(ERROR_PARSE, message, options);
    this.name = "ParseFailure";
  }
}

/** Retriable failure at the answer-client boundary (timeout, rate limit, 5xx). */
export class TransientIOFailure extends GraphBenchError {
  public readonly reason: "timeout" | "rate-limit" | "unavailable";

  constructor(
    message: string,
    options: { reason: "timeout" | "rate-limit" | "unavailable"; cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(ERROR_IO_TRANSIENT, message, options);
    this.name = "TransientIOFailure";
    this.reason = options.reason;
  }
}

export class ConfigError extends GraphBenchError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(ERROR_CONFIG, message, options);
    this.name = "ConfigError";
  }
}
