/**
 * Automation error types.
 *
 * Not-found and not-eligible outcomes inside the engine are ordinary return
 * values; these classes are for invalid input at the edges and for action
 * configs that do not match their kind.
 */

export class AutomationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutomationError';
  }
}

/** A record referenced by id does not exist. */
export class RecordNotFoundError extends AutomationError {
  readonly recordType: string;
  readonly recordId: string;

  constructor(recordType: string, recordId: string) {
    super(`${recordType} not found: ${recordId}`);
    this.name = 'RecordNotFoundError';
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/** Input that would create or leave a record in an invalid state. */
export class ValidationError extends AutomationError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * An action's kind is unknown or its config does not fit the kind's schema.
 * Raised at dispatch time, so it counts as an action failure.
 */
export class ActionConfigError extends AutomationError {
  readonly actionKind: string;

  constructor(actionKind: string, message: string) {
    super(`Invalid ${actionKind || 'unnamed'} action: ${message}`);
    this.name = 'ActionConfigError';
    this.actionKind = actionKind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
