/**
 * Error types shared across the refinement pipeline.
 *
 * Each failure mode has its own class so callers can branch on
 * `instanceof` instead of parsing messages.
 */

/**
 * The generator returned something that breaks its contract: an empty
 * batch, a test case without a label, a label that contradicts its
 * category, duplicate rule ids, and so on.
 */
export class GeneratorContractError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'GeneratorContractError';
  }
}

/**
 * A rule's query cannot be parsed or executed by the backend.
 */
export class MalformedQueryError extends Error {
  constructor(
    message: string,
    public readonly query: string,
    public readonly position?: number,
  ) {
    super(message);
    this.name = 'MalformedQueryError';
  }
}

/**
 * A single document could not be written to the evaluation backend.
 */
export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly documentId: string,
  ) {
    super(message);
    this.name = 'IngestionError';
  }
}

/**
 * A backend request failed for a reason other than a malformed query.
 * The status code is embedded in the message as "(NNN)" so the retry
 * helper can classify it.
 */
export class BackendRequestError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'BackendRequestError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
