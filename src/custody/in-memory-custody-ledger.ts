/**
 * In-Memory Custody Ledger
 *
 * Account balances and the escrow's custody balance kept in process memory.
 * Frozen accounts cannot receive funds, which is how a destination that
 * refuses a payout is modelled.
 */

import { isPublicKey, normalizePublicKey, PublicKey } from "../common/PublicKey";
import { CustodyLedger, LedgerError } from "./custody-ledger";

export class InMemoryCustodyLedger implements CustodyLedger {
	private readonly balances: Map<PublicKey, bigint> = new Map();
	private readonly frozen: Set<PublicKey> = new Set();
	private custody = 0n;

	constructor(openingBalances: Iterable<[PublicKey, bigint]> = []) {
		for (const [account, amount] of openingBalances) {
			this.credit(account, amount);
		}
	}

	async collect(from: PublicKey, amount: bigint): Promise<void> {
		assertPositive(amount);
		const balance = this.balanceOf(from);
		if (balance < amount) {
			throw new LedgerError(
				`Insufficient balance for ${from}: has ${balance}, needs ${amount}`,
				"INSUFFICIENT_FUNDS",
			);
		}
		this.balances.set(from, balance - amount);
		this.custody += amount;
	}

	async disburse(to: PublicKey, amount: bigint): Promise<void> {
		assertPositive(amount);
		if (this.frozen.has(to)) {
			throw new LedgerError(`Account ${to} cannot receive funds`, "ACCOUNT_FROZEN");
		}
		if (this.custody < amount) {
			throw new LedgerError(
				`Custody holds ${this.custody}, cannot pay out ${amount}`,
				"INSUFFICIENT_CUSTODY",
			);
		}
		this.custody -= amount;
		this.credit(to, amount);
	}

	credit(account: PublicKey, amount: bigint): void {
		if (amount < 0n) {
			throw new LedgerError("Cannot credit a negative amount", "INVALID_AMOUNT");
		}
		this.balances.set(account, this.balanceOf(account) + amount);
	}

	balanceOf(account: PublicKey): bigint {
		return this.balances.get(account) ?? 0n;
	}

	get custodyBalance(): bigint {
		return this.custody;
	}

	freeze(account: PublicKey): void {
		this.frozen.add(account);
	}

	unfreeze(account: PublicKey): void {
		this.frozen.delete(account);
	}
}

function assertPositive(amount: bigint): void {
	if (amount <= 0n) {
		throw new LedgerError(
			`Transfer amount must be positive, got ${amount}`,
			"INVALID_AMOUNT",
		);
	}
}

/**
 * Parses `pubkey:amount` pairs separated by commas, e.g. the
 * LEDGER_OPENING_BALANCES setting.
 */
export function parseOpeningBalances(
	raw: string | undefined,
): Array<[PublicKey, bigint]> {
	if (!raw || raw.trim().length === 0) {
		return [];
	}
	return raw
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0)
		.map((entry): [PublicKey, bigint] => {
			const [account, amount, ...rest] = entry.split(":");
			if (
				rest.length > 0 ||
				!isPublicKey(account) ||
				amount === undefined ||
				!/^\d+$/.test(amount)
			) {
				throw new Error(`Invalid opening balance entry: "${entry}"`);
			}
			return [normalizePublicKey(account), BigInt(amount)];
		});
}
