/**
 * @module retrieval/errors
 */

import { CollaboratorError } from "../pipeline/errors.js";

/**
 * Writing to the entity index failed
 */
export class EntityIndexError extends CollaboratorError {
  constructor(message: string, code: string = "ENTITY_INDEX_ERROR", cause?: Error, retryable: boolean = false) {
    super(message, "entity-index", { code, cause, retryable });
    this.name = "EntityIndexError";
  }
}
