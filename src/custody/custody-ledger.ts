import { PublicKey } from "../common/PublicKey";

/**
 * Moves funds in and out of escrow custody.
 *
 * Both operations either complete in full or reject, leaving balances
 * untouched.
 */
export interface CustodyLedger {
	/** Takes `amount` from `from` into escrow custody. */
	collect(from: PublicKey, amount: bigint): Promise<void>;
	/** Pays `amount` out of escrow custody to `to`. */
	disburse(to: PublicKey, amount: bigint): Promise<void>;
}

export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
	) {
		super(message);
		this.name = "LedgerError";
	}
}
