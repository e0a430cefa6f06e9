import { InMemoryAttestationGateway } from "./in-memory-attestation.gateway";

describe("InMemoryAttestationGateway", () => {
	const schemaId = `0x${"ab".repeat(32)}`;
	const shipper = "d2".repeat(32);
	const customer = "c1".repeat(32);

	it("hands out sequential proof ids starting at one", async () => {
		const gateway = new InMemoryAttestationGateway();
		const record = {
			schemaId,
			recipients: [shipper, customer],
			timestamp: 1,
			payload: new Uint8Array([9]),
		};

		expect(await gateway.attest(record)).toBe(1n);
		expect(await gateway.attest(record)).toBe(2n);
		expect(gateway.records.map((r) => r.proofId)).toEqual([1n, 2n]);
	});

	it("keeps its own copy of each record", async () => {
		const gateway = new InMemoryAttestationGateway();
		const recipients = [shipper, customer];
		const payload = new Uint8Array([1, 2]);

		await gateway.attest({ schemaId, recipients, timestamp: 5, payload });
		recipients.pop();
		payload[0] = 99;

		expect(gateway.records[0]).toEqual({
			schemaId,
			recipients: [shipper, customer],
			timestamp: 5,
			payload: new Uint8Array([1, 2]),
			proofId: 1n,
		});
	});
});
