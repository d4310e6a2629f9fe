export type EscrowId = number;

export const ESCROW_CREATED_ID = "escrow.created";
export type EscrowCreated = {
	eventId: string;
	escrowId: EscrowId;
	buyer: string;
	seller: string;
	arbiter: string;
	amount: number;
	deadline: string; // ISO timestamp
	description: string;
	createdAt: string; // ISO timestamp
};

export const ESCROW_FUNDED_ID = "escrow.funded";
export type EscrowFunded = {
	eventId: string;
	escrowId: EscrowId;
	buyer: string;
	amount: number;
	reference: string;
	fundedAt: string;
};

export const ESCROW_RELEASED_ID = "escrow.released";
export type EscrowReleased = {
	eventId: string;
	escrowId: EscrowId;
	seller: string;
	amount: number;
	reference: string;
	releasedAt: string;
};

export const ESCROW_DISPUTE_REQUESTED_ID = "escrow.dispute-requested";
export type EscrowDisputeRequested = {
	eventId: string;
	escrowId: EscrowId;
	buyer: string;
	requestedAt: string;
};

export const ESCROW_RESOLVED_ID = "escrow.resolved";
export type EscrowResolved = {
	eventId: string;
	escrowId: EscrowId;
	arbiter: string;
	releaseToSeller: boolean;
	recipient: string;
	amount: number;
	reference: string;
	resolvedAt: string;
};

export type EscrowNotification =
	| { name: typeof ESCROW_CREATED_ID; payload: EscrowCreated }
	| { name: typeof ESCROW_FUNDED_ID; payload: EscrowFunded }
	| { name: typeof ESCROW_RELEASED_ID; payload: EscrowReleased }
	| {
			name: typeof ESCROW_DISPUTE_REQUESTED_ID;
			payload: EscrowDisputeRequested;
	  }
	| { name: typeof ESCROW_RESOLVED_ID; payload: EscrowResolved };
