export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export const ESCROW_ERROR_KINDS = [
	"InvalidAmount",
	"AlreadyInitialized",
	"NotAuthorized",
	"InvalidState",
	"InvalidParty",
	"AttestationFailed",
	"TransferFailed",
] as const;

export type EscrowErrorKind = (typeof ESCROW_ERROR_KINDS)[number];

/**
 * Raised when an escrow operation is rejected. Nothing has been mutated
 * when this is thrown; `kind` names the precondition or collaborator that
 * failed.
 */
export class EscrowError extends Error {
	constructor(
		public readonly kind: EscrowErrorKind,
		message: string,
		public readonly details?: Record<string, unknown>,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "EscrowError";
	}
}
