export enum NegotiationStateErrorCode {
  CONCLUDED = 'CONCLUDED',
  ROUND_DECREASE = 'ROUND_DECREASE',
  INVALID_PARTICIPANT = 'INVALID_PARTICIPANT',
  INVALID_AGREEMENT = 'INVALID_AGREEMENT',
  NO_PENDING_OFFER = 'NO_PENDING_OFFER',
  NOT_CONCLUDED = 'NOT_CONCLUDED',
}

/**
 * A state invariant violation. The operation that raised it was rejected
 * and the state it was applied to is unchanged.
 */
export class NegotiationStateError extends Error {
  readonly code: NegotiationStateErrorCode;

  constructor(code: NegotiationStateErrorCode, message: string) {
    super(message);
    this.name = 'NegotiationStateError';
    this.code = code;
  }
}
