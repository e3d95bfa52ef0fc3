/**
 * Structured errors for the service. Fetch failures and validation rejections
 * are modelled as values (see types/research.ts); only collaborator and
 * programming failures are thrown.
 */

export class ResearchError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    },
  ) {
    super(message);
    this.name = "ResearchError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

export class InvalidTaskError extends ResearchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_TASK", { context });
    this.name = "InvalidTaskError";
  }
}

export class InvalidTransitionError extends ResearchError {
  constructor(jobId: string, from: string, to: string) {
    super(`Illegal job transition ${from} -> ${to}`, "INVALID_TRANSITION", {
      context: { jobId, from, to },
    });
    this.name = "InvalidTransitionError";
  }
}

export class InferenceError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, "INFERENCE_ERROR", {
      cause: options?.cause,
      context: options?.status !== undefined ? { status: options.status } : undefined,
      retryable: true,
    });
    this.name = "InferenceError";
  }
}

/** The citation collaborator could not be reached or answered with a server error. */
export class CollaboratorUnavailableError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, "COLLABORATOR_UNAVAILABLE", {
      cause: options?.cause,
      context: options?.status !== undefined ? { status: options.status } : undefined,
      retryable: true,
    });
    this.name = "CollaboratorUnavailableError";
  }
}

export class CitationRejectedError extends ResearchError {
  constructor(message: string, status: number) {
    super(message, "CITATION_REJECTED", { context: { status } });
    this.name = "CitationRejectedError";
  }
}

export class DeliveryError extends ResearchError {
  public readonly jobId: string;

  constructor(jobId: string, message: string, options?: { cause?: unknown; attempts?: number }) {
    super(message, "DELIVERY_FAILED", {
      cause: options?.cause,
      context: { jobId, attempts: options?.attempts },
    });
    this.name = "DeliveryError";
    this.jobId = jobId;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
