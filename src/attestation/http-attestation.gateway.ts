import { Logger } from "@nestjs/common";
import { AxiosInstance } from "axios";
import { hex } from "@scure/base";

import {
	AttestationGateway,
	MAX_PROOF_ID,
	NO_PROOF_ID,
	ProofRecord,
} from "./attestation.gateway";

type AttestRequestBody = {
	schemaId: string;
	recipients: string[];
	timestamp: number;
	payload: string;
};

/**
 * Client for an attestation service exposing `POST /attestations`.
 *
 * The service answers `{ "proofId": "<decimal u64>" }`. A response without
 * a usable id is reported as {@link NO_PROOF_ID}; transport and HTTP errors
 * are rethrown for the caller to handle.
 */
export class HttpAttestationGateway implements AttestationGateway {
	private readonly logger = new Logger(HttpAttestationGateway.name);

	constructor(private readonly http: AxiosInstance) {}

	async attest(record: ProofRecord): Promise<bigint> {
		const body: AttestRequestBody = {
			schemaId: record.schemaId,
			recipients: record.recipients,
			timestamp: record.timestamp,
			payload: `0x${hex.encode(record.payload)}`,
		};
		const response = await this.http.post<unknown>("/attestations", body);
		const proofId = parseProofId(response.data);
		if (proofId === NO_PROOF_ID) {
			this.logger.warn(
				`Attestation service returned no usable proof id: ${JSON.stringify(response.data)}`,
			);
		}
		return proofId;
	}
}

export function parseProofId(body: unknown): bigint {
	if (typeof body !== "object" || body === null || !("proofId" in body)) {
		return NO_PROOF_ID;
	}
	const raw = body.proofId;
	let proofId: bigint;
	if (typeof raw === "string" && /^\d+$/.test(raw)) {
		proofId = BigInt(raw);
	} else if (typeof raw === "number" && Number.isSafeInteger(raw)) {
		proofId = BigInt(raw);
	} else {
		return NO_PROOF_ID;
	}
	if (proofId < 0n || proofId > MAX_PROOF_ID) {
		return NO_PROOF_ID;
	}
	return proofId;
}
