import { transition, type PhaseEvent } from './state-machine.js';
import { NegotiationStateError, NegotiationStateErrorCode } from './errors.js';
import type {
  Agreement,
  NegotiationEvent,
  NegotiationOutcome,
  NegotiationState,
  Offer,
  OfferType,
  Terms,
} from './types.js';

/*
 * Every function here returns a new frozen state and never mutates its input.
 * Invariant violations throw NegotiationStateError, leaving the input as it was.
 */

export interface NegotiationInit {
  negotiation_id: string;
  participants: readonly string[];
  max_rounds: number;
}

export interface OfferInput {
  offerer: string;
  recipient: string;
  terms: Terms;
  offer_type?: OfferType;
}

function freeze(state: NegotiationState): NegotiationState {
  return Object.freeze<NegotiationState>({ ...state, history: Object.freeze([...state.history]) });
}

function assertOpen(state: NegotiationState): void {
  if (state.phase === 'concluded') {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.CONCLUDED,
      `negotiation ${state.negotiation_id} is concluded`,
    );
  }
}

function assertParticipant(state: NegotiationState, id: string): void {
  if (!state.participants.includes(id)) {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.INVALID_PARTICIPANT,
      `${id} is not a participant of ${state.negotiation_id}`,
    );
  }
}

function applyEvent(state: NegotiationState, event: PhaseEvent): NegotiationState['phase'] {
  return transition(state.phase, event) ?? state.phase;
}

export function createNegotiationState(init: NegotiationInit): NegotiationState {
  const participants = [...init.participants];
  if (participants.length < 2 || new Set(participants).size !== participants.length) {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.INVALID_PARTICIPANT,
      'a negotiation needs at least two distinct participants',
    );
  }
  if (!Number.isInteger(init.max_rounds) || init.max_rounds <= 0) {
    throw new RangeError(`max_rounds must be a positive integer, got ${init.max_rounds}`);
  }
  return freeze({
    negotiation_id: init.negotiation_id,
    participants: Object.freeze(participants),
    phase: 'opening',
    round: 0,
    max_rounds: init.max_rounds,
    history: [],
    agreement: null,
    outcome: null,
    withdrawn_by: null,
  });
}

/** Move the round counter forward. The counter never decreases. */
export function advanceRound(state: NegotiationState, round: number): NegotiationState {
  assertOpen(state);
  if (round < state.round) {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.ROUND_DECREASE,
      `round ${round} is before current round ${state.round}`,
    );
  }
  return freeze({ ...state, round });
}

/** Bargaining turns into closing as the round cap approaches. */
export function enterClosing(state: NegotiationState): NegotiationState {
  assertOpen(state);
  const phase = applyEvent(state, 'deadline_near');
  return phase === state.phase ? state : freeze({ ...state, phase });
}

function hasOffered(state: NegotiationState, participant: string): boolean {
  return state.history.some((e) => e.kind === 'offer' && e.offer.offerer === participant);
}

export function recordOffer(state: NegotiationState, input: OfferInput): NegotiationState {
  assertOpen(state);
  assertParticipant(state, input.offerer);
  assertParticipant(state, input.recipient);
  if (input.offerer === input.recipient) {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.INVALID_PARTICIPANT,
      `${input.offerer} cannot make an offer to themselves`,
    );
  }
  const offer: Offer = Object.freeze<Offer>({
    offerer: input.offerer,
    recipient: input.recipient,
    terms: Object.freeze({ ...input.terms }),
    offer_type: input.offer_type ?? (hasOffered(state, input.offerer) ? 'counter' : 'initial'),
    round: state.round,
  });
  const event: NegotiationEvent = Object.freeze<NegotiationEvent>({ kind: 'offer', offer });
  return freeze({
    ...state,
    phase: applyEvent(state, offer.offer_type === 'final' ? 'final_offer' : 'offer'),
    history: [...state.history, event],
  });
}

/**
 * Latest offer addressed to `participant` that they have not answered with
 * an offer of their own. Null when there is none.
 */
export function pendingOfferFor(state: NegotiationState, participant: string): Offer | null {
  for (let i = state.history.length - 1; i >= 0; i--) {
    const event = state.history[i];
    if (event.kind !== 'offer') continue;
    if (event.offer.offerer === participant) return null;
    if (event.offer.recipient === participant) return event.offer;
  }
  return null;
}

export function recordAgreement(
  state: NegotiationState,
  input: { parties: readonly string[]; terms: Terms },
): NegotiationState {
  assertOpen(state);
  const parties = [...input.parties];
  if (parties.length < 2 || new Set(parties).size !== parties.length) {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.INVALID_AGREEMENT,
      'an agreement needs at least two distinct parties',
    );
  }
  parties.forEach((p) => assertParticipant(state, p));

  const agreement: Agreement = Object.freeze<Agreement>({
    parties: Object.freeze(parties),
    terms: Object.freeze({ ...input.terms }),
    round: state.round,
  });
  const event: NegotiationEvent = Object.freeze<NegotiationEvent>({ kind: 'agreement', agreement });
  return freeze({
    ...state,
    phase: applyEvent(state, 'agreement'),
    history: [...state.history, event],
    agreement,
    outcome: 'agreement',
  });
}

/** `acceptor` accepts the offer pending for them. */
export function acceptOffer(state: NegotiationState, acceptor: string): NegotiationState {
  assertOpen(state);
  assertParticipant(state, acceptor);
  const offer = pendingOfferFor(state, acceptor);
  if (!offer) {
    throw new NegotiationStateError(
      NegotiationStateErrorCode.NO_PENDING_OFFER,
      `${acceptor} has no pending offer to accept`,
    );
  }
  return recordAgreement(state, { parties: [offer.offerer, acceptor], terms: offer.terms });
}

function conclude(
  state: NegotiationState,
  event: PhaseEvent,
  outcome: NegotiationOutcome,
  withdrawnBy: string | null,
): NegotiationState {
  return freeze({
    ...state,
    phase: applyEvent(state, event),
    outcome,
    withdrawn_by: withdrawnBy,
  });
}

export function recordWithdrawal(state: NegotiationState, participant: string): NegotiationState {
  assertOpen(state);
  assertParticipant(state, participant);
  return conclude(state, 'withdrawal', 'withdrawal', participant);
}

export function concludeAtRoundLimit(state: NegotiationState): NegotiationState {
  assertOpen(state);
  return conclude(state, 'round_limit', 'round_limit', null);
}
