/**
 * @module graph/errors
 *
 * Error classes for graph storage operations. All of them are
 * {@link CollaboratorError}s, so a failure inside the Storage stage surfaces
 * as a failed StageResult tagged with `collaborator: "graph"`.
 */

import { Neo4jError } from "neo4j-driver";
import { CollaboratorError } from "../pipeline/errors.js";

/**
 * Base error class for all graph-related errors
 *
 * @example
 * ```typescript
 * throw new GraphError("Failed to execute query", "QUERY_FAILED", cause, true);
 * ```
 */
export class GraphError extends CollaboratorError {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for categorization (default: 'GRAPH_ERROR')
   * @param cause - Original error that caused this error
   * @param retryable - Whether this error is retryable (default: false)
   */
  constructor(
    message: string,
    code: string = "GRAPH_ERROR",
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message, "graph", { code, cause, retryable });
    this.name = "GraphError";
  }
}

/**
 * The Neo4j server is unreachable or not connected yet. Retryable by default.
 */
export class GraphConnectionError extends GraphError {
  constructor(message: string, cause?: Error, retryable: boolean = true) {
    super(message, "CONNECTION_ERROR", cause, retryable);
    this.name = "GraphConnectionError";
  }
}

/**
 * Invalid credentials or missing permissions. Never retryable.
 */
export class GraphAuthenticationError extends GraphError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", cause, false);
    this.name = "GraphAuthenticationError";
  }
}

/**
 * A Cypher statement failed
 */
export class GraphQueryError extends GraphError {
  /** Statement that failed (parameters are never included) */
  readonly query?: string;

  constructor(message: string, query?: string, cause?: Error, retryable: boolean = false) {
    super(message, "QUERY_ERROR", cause, retryable);
    this.name = "GraphQueryError";
    this.query = query;
  }
}

/**
 * A label or relationship type failed identifier validation.
 *
 * Labels and types cannot be passed as Cypher parameters, so they are
 * interpolated and must match `^[A-Za-z][A-Za-z0-9_]*$`.
 */
export class InvalidGraphIdentifierError extends GraphError {
  /** The rejected label or type */
  readonly identifier: string;

  /**
   * @param kind - What the identifier was used as
   * @param identifier - Value that failed validation
   */
  constructor(kind: "label" | "relationship type", identifier: string) {
    super(
      `Invalid ${kind}: ${identifier}. Must start with a letter and contain only alphanumeric characters and underscores.`,
      "INVALID_IDENTIFIER"
    );
    this.name = "InvalidGraphIdentifierError";
    this.identifier = identifier;
  }
}

/**
 * Decide whether a graph failure is worth retrying
 *
 * Graph errors carry their own flag; other errors are matched against
 * connection and transient-failure messages.
 *
 * @param error - Any caught value
 */
export function isRetryableGraphError(error: unknown): boolean {
  if (error instanceof GraphError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      "econnrefused",
      "econnreset",
      "etimedout",
      "socket hang up",
      "connection refused",
      "deadlock",
      "database unavailable",
      "leader changed",
      "service unavailable",
    ];
    return retryablePatterns.some((pattern) => message.includes(pattern));
  }

  return false;
}

/**
 * Translate a neo4j-driver error into a {@link GraphError}
 *
 * Security codes map to {@link GraphAuthenticationError}, unavailable or
 * expired sessions to {@link GraphConnectionError}, and everything else to a
 * {@link GraphQueryError} that is retryable for `Neo.TransientError.*` codes.
 *
 * @param error - Value thrown by the driver
 * @param query - Statement being run, kept on query errors
 *
 * @example
 * ```typescript
 * try {
 *   await session.run(cypher, params);
 * } catch (error) {
 *   throw mapNeo4jError(error, cypher);
 * }
 * ```
 */
export function mapNeo4jError(error: unknown, query?: string): GraphError {
  if (error instanceof GraphError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));

  if (error instanceof Neo4jError) {
    const code = error.code;

    if (code.startsWith("Neo.ClientError.Security.")) {
      return new GraphAuthenticationError(`Neo4j authentication failed: ${error.message}`, cause);
    }
    if (code === "ServiceUnavailable" || code === "SessionExpired") {
      return new GraphConnectionError(`Neo4j unavailable: ${error.message}`, cause);
    }
    if (code.startsWith("Neo.TransientError.")) {
      return new GraphQueryError(`Transient Neo4j error: ${error.message}`, query, cause, true);
    }
    return new GraphQueryError(`Neo4j query failed: ${error.message}`, query, cause, false);
  }

  return new GraphQueryError(
    `Graph operation failed: ${cause.message}`,
    query,
    cause,
    isRetryableGraphError(cause)
  );
}
