/**
 * Error raised when an operation needs a non-empty structure and gets an empty one.
 */
export class EmptyStructureError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`${operation} of empty sequence`);
    this.name = 'EmptyStructureError';
    this.operation = operation;
  }
}
