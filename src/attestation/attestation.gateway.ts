import { PublicKey } from "../common/PublicKey";

/** Proof id returned by a gateway that could not record the proof. */
export const NO_PROOF_ID = 0n;

export const MAX_PROOF_ID = 2n ** 64n - 1n;

/**
 * A proof record submitted for a shipment or receipt milestone.
 */
export type ProofRecord = {
	/** Attestation schema both milestone proofs are recorded under */
	schemaId: string;
	/** Parties the proof is about, in milestone order */
	recipients: PublicKey[];
	/** Unix time in seconds at which the proof was requested */
	timestamp: number;
	payload: Uint8Array;
};

/**
 * Records immutable proof records with an external attestation service.
 *
 * Implementations resolve to the unsigned 64-bit id of the recorded proof,
 * or to {@link NO_PROOF_ID} when nothing was recorded.
 */
export interface AttestationGateway {
	attest(record: ProofRecord): Promise<bigint>;
}
