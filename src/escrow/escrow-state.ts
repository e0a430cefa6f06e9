import { PublicKey } from "../common/PublicKey";

/**
 * Lifecycle phase derived from the milestone flags.
 *
 * - uninitialized: no deposit held, waiting for a customer
 * - initialized: deposit held, waiting for the shipper's proof
 * - shipment-confirmed: shipment attested, waiting for the customer's proof
 * - receipt-confirmed: both proofs recorded, funds about to be released.
 *   Only ever exists inside a running transition.
 */
export type EscrowPhase =
	| "uninitialized"
	| "initialized"
	| "shipment-confirmed"
	| "receipt-confirmed";

type EscrowFields = {
	owner: PublicKey;
	schemaId: string;
	customer: PublicKey | null;
	shipper: PublicKey | null;
	amount: bigint;
	shipmentConfirmed: boolean;
	receiptConfirmed: boolean;
};

export type EscrowParties = {
	customer: PublicKey;
	shipper: PublicKey;
};

/**
 * JSON-safe view of the escrow, amounts as decimal strings.
 */
export type EscrowSnapshot = {
	owner: PublicKey;
	schemaId: string;
	customer: PublicKey | null;
	shipper: PublicKey | null;
	amount: string;
	shipmentConfirmed: boolean;
	receiptConfirmed: boolean;
	phase: EscrowPhase;
};

/**
 * Immutable escrow state. Transitions return a new instance; the engine
 * holds the only reference to the current one and swaps it in once a
 * transition has completed.
 */
export class EscrowState {
	private constructor(private readonly fields: Readonly<EscrowFields>) {}

	static create(owner: PublicKey, schemaId: string): EscrowState {
		return new EscrowState({
			owner,
			schemaId,
			customer: null,
			shipper: null,
			amount: 0n,
			shipmentConfirmed: false,
			receiptConfirmed: false,
		});
	}

	get owner(): PublicKey {
		return this.fields.owner;
	}

	get schemaId(): string {
		return this.fields.schemaId;
	}

	get customer(): PublicKey | null {
		return this.fields.customer;
	}

	get shipper(): PublicKey | null {
		return this.fields.shipper;
	}

	get amount(): bigint {
		return this.fields.amount;
	}

	get shipmentConfirmed(): boolean {
		return this.fields.shipmentConfirmed;
	}

	get receiptConfirmed(): boolean {
		return this.fields.receiptConfirmed;
	}

	get isInitialized(): boolean {
		return this.fields.customer !== null && this.fields.shipper !== null;
	}

	get phase(): EscrowPhase {
		if (!this.isInitialized) {
			return "uninitialized";
		}
		if (this.fields.receiptConfirmed) {
			return "receipt-confirmed";
		}
		return this.fields.shipmentConfirmed ? "shipment-confirmed" : "initialized";
	}

	/**
	 * Both parties of an initialized escrow.
	 * @throws Error when called on an uninitialized escrow
	 */
	parties(): EscrowParties {
		const { customer, shipper } = this.fields;
		if (customer === null || shipper === null) {
			throw new Error("Escrow has no parties while uninitialized");
		}
		return { customer, shipper };
	}

	withDeposit(
		customer: PublicKey,
		shipper: PublicKey,
		amount: bigint,
	): EscrowState {
		return this.next({ customer, shipper, amount });
	}

	withShipmentConfirmed(): EscrowState {
		return this.next({ shipmentConfirmed: true });
	}

	withReceiptConfirmed(): EscrowState {
		return this.next({ receiptConfirmed: true });
	}

	reset(): EscrowState {
		return EscrowState.create(this.fields.owner, this.fields.schemaId);
	}

	/**
	 * Lists every invariant this state breaks; empty for a valid state.
	 */
	violations(): string[] {
		const { customer, shipper, amount, shipmentConfirmed, receiptConfirmed } =
			this.fields;
		const found: string[] = [];
		if (amount < 0n) {
			found.push("amount is negative");
		}
		if ((customer === null) !== (shipper === null)) {
			found.push("customer and shipper must be set together");
		}
		if ((amount > 0n) !== this.isInitialized) {
			found.push("amount must be positive exactly when parties are set");
		}
		if (receiptConfirmed && !shipmentConfirmed) {
			found.push("receipt confirmed before shipment");
		}
		if (!this.isInitialized && (shipmentConfirmed || receiptConfirmed)) {
			found.push("milestone flags set on an uninitialized escrow");
		}
		return found;
	}

	assertInvariants(): void {
		const found = this.violations();
		if (found.length > 0) {
			throw new Error(`Escrow state invariant violated: ${found.join("; ")}`);
		}
	}

	snapshot(): EscrowSnapshot {
		return {
			owner: this.fields.owner,
			schemaId: this.fields.schemaId,
			customer: this.fields.customer,
			shipper: this.fields.shipper,
			amount: this.fields.amount.toString(),
			shipmentConfirmed: this.fields.shipmentConfirmed,
			receiptConfirmed: this.fields.receiptConfirmed,
			phase: this.phase,
		};
	}

	private next(changes: Partial<EscrowFields>): EscrowState {
		return new EscrowState({ ...this.fields, ...changes });
	}
}
