import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";

import { ATTESTATION_GATEWAY } from "../attestation/attestation.constants";
import {
	AttestationGateway,
	MAX_PROOF_ID,
	NO_PROOF_ID,
	ProofRecord,
} from "../attestation/attestation.gateway";
import { CUSTODY_LEDGER } from "../custody/custody.constants";
import { CustodyLedger, LedgerError } from "../custody/custody-ledger";
import { EscrowError, toError } from "../common/errors";
import {
	ESCROW_CANCELLED_ID,
	ESCROW_INITIALIZED_ID,
	EscrowCancelled,
	EscrowInitialized,
	FUNDS_RELEASED_ID,
	FundsReleased,
	RECEIPT_CONFIRMED_ID,
	ReceiptConfirmed,
	SHIPMENT_CONFIRMED_ID,
	ShipmentConfirmed,
} from "../common/escrow.event";
import {
	isPublicKey,
	normalizePublicKey,
	PublicKey,
} from "../common/PublicKey";
import { EscrowAction, canPerform, getAllowedActions } from "./escrow-lifecycle";
import {
	EscrowParties,
	EscrowPhase,
	EscrowSnapshot,
	EscrowState,
} from "./escrow-state";

const SCHEMA_ID = /^0x[0-9a-fA-F]{64}$/;

export type ShipmentConfirmation = {
	proofId: bigint;
	state: EscrowSnapshot;
};

export type ReceiptConfirmation = {
	proofId: bigint;
	releasedTo: PublicKey;
	releasedAmount: bigint;
	state: EscrowSnapshot;
};

type PendingEvent = { name: string; payload: object };

/**
 * Drives the escrow through its lifecycle.
 *
 * Operations run one at a time. Each one validates the caller and the
 * current state, performs its side effects against the attestation gateway
 * and the custody ledger, and only then replaces the current state and
 * emits its events. A rejected operation leaves state untouched.
 */
@Injectable()
export class EscrowEngineService {
	private readonly logger = new Logger(EscrowEngineService.name);
	private state: EscrowState;
	private pending: Promise<void> = Promise.resolve();

	constructor(
		configService: ConfigService,
		@Inject(ATTESTATION_GATEWAY)
		private readonly attestations: AttestationGateway,
		@Inject(CUSTODY_LEDGER) private readonly ledger: CustodyLedger,
		private readonly events: EventEmitter2,
	) {
		const owner = configService.get<string>("ESCROW_OWNER_PUBKEY");
		if (!owner) {
			throw new Error("ESCROW_OWNER_PUBKEY is not set");
		}
		if (!isPublicKey(owner)) {
			throw new Error("ESCROW_OWNER_PUBKEY must be a 32-byte hex public key");
		}
		const schemaId = configService.get<string>("ATTESTATION_SCHEMA_ID");
		if (!schemaId) {
			throw new Error("ATTESTATION_SCHEMA_ID is not set");
		}
		if (!SCHEMA_ID.test(schemaId)) {
			throw new Error("ATTESTATION_SCHEMA_ID must be a 0x-prefixed 32-byte hex id");
		}
		this.logger.log(`ESCROW_OWNER_PUBKEY=${owner}`);
		this.logger.log(`ATTESTATION_SCHEMA_ID=${schemaId}`);
		this.state = EscrowState.create(
			normalizePublicKey(owner),
			schemaId.toLowerCase(),
		);
	}

	/**
	 * Opens a new escrow: the caller becomes the customer and hands
	 * `depositAmount` into custody for `shipper`.
	 */
	async initialize(
		caller: PublicKey,
		shipper: PublicKey,
		depositAmount: bigint,
	): Promise<EscrowSnapshot> {
		return this.run("initialize", async () => {
			const current = this.state;
			if (depositAmount <= 0n) {
				throw new EscrowError(
					"InvalidAmount",
					`Deposit amount must be greater than zero, got ${depositAmount}`,
					{ amount: depositAmount.toString() },
				);
			}
			if (current.isInitialized) {
				throw new EscrowError(
					"AlreadyInitialized",
					"An escrow is already in progress",
					{ phase: current.phase },
				);
			}
			const customer = this.requireParty(caller, "customer");
			const counterparty = this.requireParty(shipper, "shipper");
			if (counterparty === customer) {
				throw new EscrowError(
					"InvalidParty",
					"Shipper and customer must be different parties",
				);
			}
			if (customer === current.owner || counterparty === current.owner) {
				throw new EscrowError(
					"InvalidParty",
					"The escrow owner cannot be a party to the escrow",
				);
			}

			await this.transfer(
				() => this.ledger.collect(customer, depositAmount),
				{ from: customer, amount: depositAmount.toString() },
				`Could not collect deposit of ${depositAmount} from ${customer}`,
			);

			const next = current.withDeposit(customer, counterparty, depositAmount);
			this.commit(next, [
				{
					name: ESCROW_INITIALIZED_ID,
					payload: {
						eventId: nanoid(8),
						customer,
						shipper: counterparty,
						amount: depositAmount,
						initializedAt: new Date().toISOString(),
					} satisfies EscrowInitialized,
				},
			]);
			this.logger.log(
				`Escrow initialized: ${customer} deposited ${depositAmount} for ${counterparty}`,
			);
			return next.snapshot();
		});
	}

	/**
	 * Records the shipper's proof of shipment.
	 */
	async confirmShipment(
		caller: PublicKey,
		proofData: Uint8Array,
	): Promise<ShipmentConfirmation> {
		return this.run("confirmShipment", async () => {
			const current = this.state;
			const { customer, shipper } = this.requireInitialized(current);
			if (normalizePublicKey(caller) !== shipper) {
				throw new EscrowError(
					"NotAuthorized",
					"Only the shipper can confirm shipment",
					{ caller },
				);
			}
			this.requireAction(current.phase, "confirm-shipment");

			const proofId = await this.recordProof(
				current,
				[shipper, customer],
				proofData,
			);

			const next = current.withShipmentConfirmed();
			this.commit(next, [
				{
					name: SHIPMENT_CONFIRMED_ID,
					payload: {
						eventId: nanoid(8),
						shipper,
						proofId,
						confirmedAt: new Date().toISOString(),
					} satisfies ShipmentConfirmed,
				},
			]);
			this.logger.log(`Shipment confirmed by ${shipper} with proof ${proofId}`);
			return { proofId, state: next.snapshot() };
		});
	}

	/**
	 * Records the customer's proof of receipt and releases the custodied
	 * funds to the shipper. Attestation and payout succeed together or the
	 * call fails with the escrow unchanged.
	 */
	async confirmReceipt(
		caller: PublicKey,
		proofData: Uint8Array,
	): Promise<ReceiptConfirmation> {
		return this.run("confirmReceipt", async () => {
			const current = this.state;
			const { customer, shipper } = this.requireInitialized(current);
			if (normalizePublicKey(caller) !== customer) {
				throw new EscrowError(
					"NotAuthorized",
					"Only the customer can confirm receipt",
					{ caller },
				);
			}
			this.requireAction(current.phase, "confirm-receipt");

			const proofId = await this.recordProof(
				current,
				[customer, shipper],
				proofData,
			);
			const confirmed = current.withReceiptConfirmed();
			const amount = confirmed.amount;
			const released = await this.releaseFunds(confirmed);

			const confirmedAt = new Date().toISOString();
			this.commit(released, [
				{
					name: RECEIPT_CONFIRMED_ID,
					payload: {
						eventId: nanoid(8),
						customer,
						proofId,
						confirmedAt,
					} satisfies ReceiptConfirmed,
				},
				{
					name: FUNDS_RELEASED_ID,
					payload: {
						eventId: nanoid(8),
						shipper,
						amount,
						releasedAt: confirmedAt,
					} satisfies FundsReleased,
				},
			]);
			this.logger.log(
				`Receipt confirmed by ${customer} with proof ${proofId}; released ${amount} to ${shipper}`,
			);
			return {
				proofId,
				releasedTo: shipper,
				releasedAmount: amount,
				state: released.snapshot(),
			};
		});
	}

	/**
	 * Aborts an escrow before shipment and refunds the customer.
	 * Reserved for the owner.
	 */
	async cancelEscrow(caller: PublicKey): Promise<EscrowSnapshot> {
		return this.run("cancelEscrow", async () => {
			const current = this.state;
			if (normalizePublicKey(caller) !== current.owner) {
				throw new EscrowError(
					"NotAuthorized",
					"Only the owner can cancel the escrow",
					{ caller },
				);
			}
			this.requireAction(current.phase, "cancel");
			const { customer } = current.parties();
			const amount = current.amount;

			await this.transfer(
				() => this.ledger.disburse(customer, amount),
				{ to: customer, amount: amount.toString() },
				`Could not refund ${amount} to ${customer}`,
			);

			const next = current.reset();
			this.commit(next, [
				{
					name: ESCROW_CANCELLED_ID,
					payload: {
						eventId: nanoid(8),
						customer,
						amount,
						cancelledAt: new Date().toISOString(),
					} satisfies EscrowCancelled,
				},
			]);
			this.logger.log(`Escrow cancelled; refunded ${amount} to ${customer}`);
			return next.snapshot();
		});
	}

	getOwner(): PublicKey {
		return this.state.owner;
	}

	getSchemaId(): string {
		return this.state.schemaId;
	}

	getCustomer(): PublicKey | null {
		return this.state.customer;
	}

	getShipper(): PublicKey | null {
		return this.state.shipper;
	}

	getAmount(): bigint {
		return this.state.amount;
	}

	isShipmentConfirmed(): boolean {
		return this.state.shipmentConfirmed;
	}

	isReceiptConfirmed(): boolean {
		return this.state.receiptConfirmed;
	}

	getPhase(): EscrowPhase {
		return this.state.phase;
	}

	snapshot(): EscrowSnapshot {
		return this.state.snapshot();
	}

	/**
	 * Pays the custodied amount out to the shipper and returns the reset
	 * state. Only reachable from confirmReceipt.
	 */
	private async releaseFunds(confirmed: EscrowState): Promise<EscrowState> {
		if (!confirmed.shipmentConfirmed || !confirmed.receiptConfirmed) {
			throw new EscrowError(
				"InvalidState",
				"Funds can only be released once shipment and receipt are confirmed",
				{ phase: confirmed.phase },
			);
		}
		this.requireAction(confirmed.phase, "release");
		const { shipper } = confirmed.parties();
		const amount = confirmed.amount;
		await this.transfer(
			() => this.ledger.disburse(shipper, amount),
			{ to: shipper, amount: amount.toString() },
			`Could not release ${amount} to ${shipper}`,
		);
		return confirmed.reset();
	}

	private async recordProof(
		current: EscrowState,
		recipients: PublicKey[],
		payload: Uint8Array,
	): Promise<bigint> {
		const record: ProofRecord = {
			schemaId: current.schemaId,
			recipients,
			timestamp: Math.floor(Date.now() / 1000),
			payload,
		};
		let proofId: bigint;
		try {
			proofId = await this.attestations.attest(record);
		} catch (cause) {
			this.logger.error("Attestation gateway request failed", toError(cause));
			throw new EscrowError(
				"AttestationFailed",
				"Attestation gateway request failed",
				{ recipients },
				{ cause },
			);
		}
		if (proofId <= NO_PROOF_ID || proofId > MAX_PROOF_ID) {
			throw new EscrowError(
				"AttestationFailed",
				"Attestation gateway did not return a valid proof id",
				{ recipients },
			);
		}
		return proofId;
	}

	private async transfer(
		move: () => Promise<void>,
		details: Record<string, string>,
		message: string,
	): Promise<void> {
		try {
			await move();
		} catch (cause) {
			this.logger.error(message, toError(cause));
			const ledgerCode = cause instanceof LedgerError ? cause.code : undefined;
			throw new EscrowError(
				"TransferFailed",
				message,
				ledgerCode ? { ...details, ledgerCode } : details,
				{ cause },
			);
		}
	}

	private requireInitialized(current: EscrowState): EscrowParties {
		if (!current.isInitialized) {
			throw new EscrowError("InvalidState", "Escrow is not initialized", {
				phase: current.phase,
			});
		}
		return current.parties();
	}

	private requireAction(phase: EscrowPhase, action: EscrowAction): void {
		if (!canPerform(phase, action)) {
			throw new EscrowError(
				"InvalidState",
				`Action "${action}" is not allowed while the escrow is "${phase}"`,
				{ action, phase, allowedActions: getAllowedActions(phase) },
			);
		}
	}

	private requireParty(
		identity: PublicKey,
		role: "customer" | "shipper",
	): PublicKey {
		if (!isPublicKey(identity)) {
			throw new EscrowError(
				"InvalidParty",
				`The ${role} must be identified by a 32-byte hex public key`,
				{ [role]: identity },
			);
		}
		return normalizePublicKey(identity);
	}

	/**
	 * Swaps in the next state, then emits. A throwing listener is logged
	 * and does not stop the remaining events; the transition stands.
	 */
	private commit(next: EscrowState, events: PendingEvent[]): void {
		next.assertInvariants();
		this.state = next;
		for (const { name, payload } of events) {
			try {
				this.events.emit(name, payload);
			} catch (e) {
				this.logger.error(`Listener for ${name} failed`, toError(e));
			}
		}
	}

	/**
	 * Runs one operation under the escrow's write lock, logging rejections.
	 */
	private async run<T>(operation: string, action: () => Promise<T>): Promise<T> {
		const previous = this.pending;
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		this.pending = previous.then(() => current);

		try {
			await previous;
			return await action();
		} catch (error) {
			if (error instanceof EscrowError) {
				const details = error.details ? ` ${JSON.stringify(error.details)}` : "";
				this.logger.warn(
					`${operation} rejected (${error.kind}): ${error.message}${details}`,
				);
			}
			throw error;
		} finally {
			release();
		}
	}
}
