import { Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Observable, Subject } from "rxjs";
import {
	ESCROW_CREATED_ID,
	ESCROW_DISPUTE_REQUESTED_ID,
	ESCROW_FUNDED_ID,
	ESCROW_RELEASED_ID,
	ESCROW_RESOLVED_ID,
	type EscrowCreated,
	type EscrowDisputeRequested,
	type EscrowFunded,
	EscrowId,
	EscrowNotification,
	type EscrowReleased,
	type EscrowResolved,
} from "../common/escrow.event";

/**
 * Audit trail of committed escrow transitions: one log line per
 * notification, republished on an observable feed for collaborators.
 */
@Injectable()
export class EscrowAuditService {
	private readonly logger = new Logger(EscrowAuditService.name);
	private readonly events$ = new Subject<EscrowNotification>();

	feed(escrowId?: EscrowId): Observable<EscrowNotification> {
		if (escrowId !== undefined) {
			return this.events$.pipe(filter((n) => n.payload.escrowId === escrowId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(ESCROW_CREATED_ID)
	onCreated(evt: EscrowCreated) {
		this.logger.log(
			`[${evt.eventId}] escrow ${evt.escrowId} created: buyer=${evt.buyer} seller=${evt.seller} arbiter=${evt.arbiter} amount=${evt.amount} deadline=${evt.deadline}`,
		);
		this.events$.next({ name: ESCROW_CREATED_ID, payload: evt });
	}

	@OnEvent(ESCROW_FUNDED_ID)
	onFunded(evt: EscrowFunded) {
		this.logger.log(
			`[${evt.eventId}] escrow ${evt.escrowId} funded: ${evt.amount} from ${evt.buyer} (${evt.reference})`,
		);
		this.events$.next({ name: ESCROW_FUNDED_ID, payload: evt });
	}

	@OnEvent(ESCROW_RELEASED_ID)
	onReleased(evt: EscrowReleased) {
		this.logger.log(
			`[${evt.eventId}] escrow ${evt.escrowId} released: ${evt.amount} to ${evt.seller} (${evt.reference})`,
		);
		this.events$.next({ name: ESCROW_RELEASED_ID, payload: evt });
	}

	@OnEvent(ESCROW_DISPUTE_REQUESTED_ID)
	onDisputeRequested(evt: EscrowDisputeRequested) {
		this.logger.log(
			`[${evt.eventId}] escrow ${evt.escrowId} disputed by ${evt.buyer}`,
		);
		this.events$.next({ name: ESCROW_DISPUTE_REQUESTED_ID, payload: evt });
	}

	@OnEvent(ESCROW_RESOLVED_ID)
	onResolved(evt: EscrowResolved) {
		this.logger.log(
			`[${evt.eventId}] escrow ${evt.escrowId} resolved by ${evt.arbiter}: ${evt.releaseToSeller ? "seller" : "buyer"} receives ${evt.amount} (${evt.reference})`,
		);
		this.events$.next({ name: ESCROW_RESOLVED_ID, payload: evt });
	}
}
