/**
 * Parties are identified by their x-only public key, hex encoded.
 */
export type PublicKey = string;

const X_ONLY_PUBKEY_HEX = /^[0-9a-fA-F]{64}$/;

export function isPublicKey(value: unknown): value is PublicKey {
	return typeof value === "string" && X_ONLY_PUBKEY_HEX.test(value);
}

export function normalizePublicKey(value: PublicKey): PublicKey {
	return value.toLowerCase();
}
