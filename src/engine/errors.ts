/**
 * Errors raised by the winding core.
 *
 * All three are recoverable from the host's point of view: the requested
 * winding is rejected with a readable message and no segments are produced.
 */

export type WindingErrorKind = 'invalid-geometry' | 'precondition-violated' | 'geometry-exhausted';

export class WindingError extends Error {
  constructor(
    readonly kind: WindingErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'WindingError';
  }
}

/**
 * The raw parameters cannot describe a rounded rectangle, or cannot hold the
 * requested number of turns. Raised by the validator before any geometry exists.
 */
export class InvalidGeometry extends WindingError {
  constructor(
    message: string,
    readonly field?: string
  ) {
    super('invalid-geometry', message);
    this.name = 'InvalidGeometry';
  }
}

/**
 * A component received input that never went through the validator.
 * This is a programming defect in the caller, not a user error.
 */
export class PreconditionViolated extends WindingError {
  constructor(message: string) {
    super('precondition-violated', message);
    this.name = 'PreconditionViolated';
  }
}

/**
 * The assembler ran out of usable window part way through the turns.
 */
export class GeometryExhausted extends WindingError {
  constructor(
    readonly completedTurns: number,
    readonly requestedTurns: number,
    reason: string
  ) {
    super(
      'geometry-exhausted',
      `Window exhausted after ${completedTurns} of ${requestedTurns} turns: ${reason}`
    );
    this.name = 'GeometryExhausted';
  }
}

export const isWindingError = (value: unknown): value is WindingError =>
  value instanceof WindingError;
