/**
 * In-Memory Attestation Gateway
 *
 * Records proofs in process memory with sequential ids starting at 1.
 * Used for local development and tests; records are lost on exit.
 */

import { Logger } from "@nestjs/common";
import { hex } from "@scure/base";
import { AttestationGateway, ProofRecord } from "./attestation.gateway";

export type StoredProof = ProofRecord & { proofId: bigint };

export class InMemoryAttestationGateway implements AttestationGateway {
	private readonly logger = new Logger(InMemoryAttestationGateway.name);
	private readonly proofs: StoredProof[] = [];
	private nextId = 1n;

	async attest(record: ProofRecord): Promise<bigint> {
		const proofId = this.nextId;
		this.nextId += 1n;
		this.proofs.push({
			...record,
			recipients: [...record.recipients],
			payload: Uint8Array.from(record.payload),
			proofId,
		});
		this.logger.debug(
			`Recorded proof ${proofId} under ${record.schemaId} (payload ${hex.encode(record.payload)})`,
		);
		return proofId;
	}

	get records(): readonly StoredProof[] {
		return this.proofs;
	}
}
