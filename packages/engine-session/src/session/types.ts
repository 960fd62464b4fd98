/** Negotiation lifecycle phase. */
export type NegotiationPhase = 'opening' | 'bargaining' | 'closing' | 'concluded';

/** Why a concluded negotiation concluded. */
export type NegotiationOutcome = 'agreement' | 'round_limit' | 'withdrawal';

export type OfferType = 'initial' | 'counter' | 'final';

export type Terms = Readonly<Record<string, number | string>>;

/** A proposal. Frozen once recorded. */
export interface Offer {
  readonly offerer: string;
  readonly recipient: string;
  readonly terms: Terms;
  readonly offer_type: OfferType;
  readonly round: number;
}

/** A reached settlement. Terminal for its negotiation. */
export interface Agreement {
  readonly parties: readonly string[];
  readonly terms: Terms;
  readonly round: number;
}

export type NegotiationEvent =
  | { readonly kind: 'offer'; readonly offer: Offer }
  | { readonly kind: 'agreement'; readonly agreement: Agreement };

/** Full negotiation state. Updated only through the session/state.ts functions. */
export interface NegotiationState {
  readonly negotiation_id: string;
  readonly participants: readonly string[];
  readonly phase: NegotiationPhase;
  readonly round: number;
  readonly max_rounds: number;
  readonly history: readonly NegotiationEvent[];
  readonly agreement: Agreement | null;
  readonly outcome: NegotiationOutcome | null;
  readonly withdrawn_by: string | null;
}

/** One participant's move in a round. */
export type RoundAction =
  | {
      readonly type: 'offer';
      readonly participant: string;
      readonly recipient: string;
      readonly terms: Terms;
      readonly offer_type?: OfferType;
      readonly statement?: string;
    }
  | { readonly type: 'accept'; readonly participant: string; readonly statement?: string }
  | { readonly type: 'withdraw'; readonly participant: string; readonly statement?: string };
