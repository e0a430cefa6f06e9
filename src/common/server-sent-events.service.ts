import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { Observable, Subject } from "rxjs";

import {
	ESCROW_CANCELLED_ID,
	ESCROW_INITIALIZED_ID,
	type EscrowCancelled,
	type EscrowInitialized,
	FUNDS_RELEASED_ID,
	type FundsReleased,
	RECEIPT_CONFIRMED_ID,
	type ReceiptConfirmed,
	SHIPMENT_CONFIRMED_ID,
	type ShipmentConfirmed,
} from "./escrow.event";

export type EscrowSse =
	| {
			type: "escrow_initialized";
			customer: string;
			shipper: string;
			amount: string;
			at: string;
	  }
	| { type: "shipment_confirmed"; shipper: string; proofId: string; at: string }
	| { type: "receipt_confirmed"; customer: string; proofId: string; at: string }
	| { type: "funds_released"; shipper: string; amount: string; at: string }
	| { type: "escrow_cancelled"; customer: string; amount: string; at: string };

export type SseEvent<T> = {
	data: T;
};

/**
 * Bridges escrow events to server-sent event subscribers, amounts and
 * proof ids as decimal strings.
 */
@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowSse>();

	get escrowEvents(): Observable<EscrowSse> {
		return this.events$.asObservable();
	}

	@OnEvent(ESCROW_INITIALIZED_ID)
	onEscrowInitialized(evt: EscrowInitialized) {
		this.events$.next({
			type: "escrow_initialized",
			customer: evt.customer,
			shipper: evt.shipper,
			amount: evt.amount.toString(),
			at: evt.initializedAt,
		});
	}

	@OnEvent(SHIPMENT_CONFIRMED_ID)
	onShipmentConfirmed(evt: ShipmentConfirmed) {
		this.events$.next({
			type: "shipment_confirmed",
			shipper: evt.shipper,
			proofId: evt.proofId.toString(),
			at: evt.confirmedAt,
		});
	}

	@OnEvent(RECEIPT_CONFIRMED_ID)
	onReceiptConfirmed(evt: ReceiptConfirmed) {
		this.events$.next({
			type: "receipt_confirmed",
			customer: evt.customer,
			proofId: evt.proofId.toString(),
			at: evt.confirmedAt,
		});
	}

	@OnEvent(FUNDS_RELEASED_ID)
	onFundsReleased(evt: FundsReleased) {
		this.events$.next({
			type: "funds_released",
			shipper: evt.shipper,
			amount: evt.amount.toString(),
			at: evt.releasedAt,
		});
	}

	@OnEvent(ESCROW_CANCELLED_ID)
	onEscrowCancelled(evt: EscrowCancelled) {
		this.events$.next({
			type: "escrow_cancelled",
			customer: evt.customer,
			amount: evt.amount.toString(),
			at: evt.cancelledAt,
		});
	}
}
