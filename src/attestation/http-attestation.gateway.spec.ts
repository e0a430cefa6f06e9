import axios, { InternalAxiosRequestConfig } from "axios";

import { MAX_PROOF_ID, ProofRecord } from "./attestation.gateway";
import {
	HttpAttestationGateway,
	parseProofId,
} from "./http-attestation.gateway";

const SCHEMA_ID = `0x${"ab".repeat(32)}`;
const SHIPPER = "d2".repeat(32);
const CUSTOMER = "c1".repeat(32);

const record: ProofRecord = {
	schemaId: SCHEMA_ID,
	recipients: [SHIPPER, CUSTOMER],
	timestamp: 1_700_000_000,
	payload: new Uint8Array([1, 2, 171]),
};

function gatewayAnswering(
	data: unknown,
	requests: InternalAxiosRequestConfig[] = [],
): HttpAttestationGateway {
	const http = axios.create({
		baseURL: "http://attestations.test",
		adapter: async (config) => {
			requests.push(config);
			return { data, status: 200, statusText: "OK", headers: {}, config };
		},
	});
	return new HttpAttestationGateway(http);
}

describe("HttpAttestationGateway", () => {
	it("posts the proof record and returns the proof id", async () => {
		const requests: InternalAxiosRequestConfig[] = [];
		const gateway = gatewayAnswering({ proofId: "42" }, requests);

		await expect(gateway.attest(record)).resolves.toBe(42n);

		expect(requests).toHaveLength(1);
		expect(requests[0].method).toBe("post");
		expect(requests[0].url).toBe("/attestations");
		expect(JSON.parse(String(requests[0].data))).toEqual({
			schemaId: SCHEMA_ID,
			recipients: [SHIPPER, CUSTOMER],
			timestamp: 1_700_000_000,
			payload: "0x0102ab",
		});
	});

	it("reports a response without a proof id as zero", async () => {
		const gateway = gatewayAnswering({ status: "queued" });

		await expect(gateway.attest(record)).resolves.toBe(0n);
	});

	it("propagates transport failures", async () => {
		const http = axios.create({
			adapter: async () => {
				throw new Error("connect ECONNREFUSED");
			},
		});
		const gateway = new HttpAttestationGateway(http);

		await expect(gateway.attest(record)).rejects.toThrow("connect ECONNREFUSED");
	});
});

describe("parseProofId", () => {
	it("accepts decimal strings and safe integers", () => {
		expect(parseProofId({ proofId: "43" })).toBe(43n);
		expect(parseProofId({ proofId: 7 })).toBe(7n);
		expect(parseProofId({ proofId: "18446744073709551615" })).toBe(MAX_PROOF_ID);
	});

	it.each([
		["a missing body", undefined],
		["a missing id", {}],
		["a non-numeric id", { proofId: "abc" }],
		["a negative id", { proofId: -1 }],
		["a fractional id", { proofId: 1.5 }],
		["an id beyond 64 bits", { proofId: "18446744073709551616" }],
	])("returns zero for %s", (_label, body) => {
		expect(parseProofId(body)).toBe(0n);
	});
});
