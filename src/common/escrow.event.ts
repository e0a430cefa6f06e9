import { PublicKey } from "./PublicKey";

export const ESCROW_INITIALIZED_ID = "escrow.initialized";
export type EscrowInitialized = {
	eventId: string;
	customer: PublicKey;
	shipper: PublicKey;
	amount: bigint;
	initializedAt: string; // ISO timestamp
};

export const SHIPMENT_CONFIRMED_ID = "escrow.shipment-confirmed";
export type ShipmentConfirmed = {
	eventId: string;
	shipper: PublicKey;
	proofId: bigint;
	confirmedAt: string;
};

export const RECEIPT_CONFIRMED_ID = "escrow.receipt-confirmed";
export type ReceiptConfirmed = {
	eventId: string;
	customer: PublicKey;
	proofId: bigint;
	confirmedAt: string;
};

export const FUNDS_RELEASED_ID = "escrow.funds-released";
export type FundsReleased = {
	eventId: string;
	shipper: PublicKey;
	amount: bigint;
	releasedAt: string;
};

export const ESCROW_CANCELLED_ID = "escrow.cancelled";
export type EscrowCancelled = {
	eventId: string;
	customer: PublicKey;
	amount: bigint;
	cancelledAt: string;
};
