import type { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from "fastify";

export type StoreName = "mongodb" | "neo4j";

export type ErrorKind = "validation" | "not_found" | "backend";

export interface StructuredError {
  success: false;
  error: string;
}

/**
 * Base class for every error a federation component can signal. The HTTP
 * status is derived from `kind` in one place (`registerErrorHandler`).
 */
export abstract class FederationError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly statusCode: number;
}

export class ValidationError extends FederationError {
  readonly kind = "validation";
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends FederationError {
  readonly kind = "not_found";
  readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class BackendError extends FederationError {
  readonly kind = "backend";
  readonly statusCode = 500;

  constructor(
    readonly store: StoreName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BackendError";
  }
}

export function isFederationError(error: unknown): error is FederationError {
  return error instanceof FederationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a store operation and rethrows any driver failure as a BackendError
 * carrying the driver's message verbatim. Typed federation errors pass through.
 */
export async function withBackend<T>(store: StoreName, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isFederationError(error)) throw error;
    throw new BackendError(store, errorMessage(error), { cause: error });
  }
}

function failure(error: string): StructuredError {
  return { success: false, error };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(
    async (error: FastifyError | FederationError, request: FastifyRequest, reply: FastifyReply) => {
      if (isFederationError(error)) {
        if (error instanceof BackendError) {
          request.log.error({ err: error, store: error.store }, "store operation failed");
        }
        return reply.code(error.statusCode).send(failure(error.message));
      }

      // Fastify validation errors (JSON Schema)
      if (error.validation) {
        return reply.code(400).send(failure(`Validation failed: ${error.message}`));
      }

      const statusCode = error.statusCode ?? 500;
      if (statusCode >= 400 && statusCode < 500) {
        return reply.code(statusCode).send(failure(error.message));
      }

      // Internal server errors: do NOT expose stack traces
      request.log.error(error);
      return reply.code(500).send(failure("Internal server error"));
    },
  );
}
