/**
 * Raised when engine wiring breaks an internal contract (a sweep baseline that
 * fails validation, an empty scenario set, an unknown preset id). Never used
 * for user-input problems: those come back as a ValidationFailureV1 value.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}
