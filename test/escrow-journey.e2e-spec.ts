import request from "supertest";
import { Test, type TestingModule } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";

import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";
import { ATTESTATION_GATEWAY } from "../src/attestation/attestation.constants";
import { InMemoryAttestationGateway } from "../src/attestation/in-memory-attestation.gateway";
import { CUSTODY_LEDGER } from "../src/custody/custody.constants";
import { InMemoryCustodyLedger } from "../src/custody/in-memory-custody-ledger";
import {
	FUNDS_RELEASED_ID,
	FundsReleased,
	RECEIPT_CONFIRMED_ID,
} from "../src/common/escrow.event";
import {
	CUSTOMER,
	OWNER,
	postAs,
	SCHEMA_ID,
	SHIPPER,
	useTestEnvironment,
} from "./utils";

describe("Escrow from deposit to released funds", () => {
	let app: INestApplication;
	let ledger: InMemoryCustodyLedger;
	let attestations: InMemoryAttestationGateway;

	beforeEach(async () => {
		useTestEnvironment();
		ledger = new InMemoryCustodyLedger([[CUSTOMER, 1_000n]]);
		attestations = new InMemoryAttestationGateway();

		const moduleFixture: TestingModule = await Test.createTestingModule({
			imports: [AppModule],
		})
			.overrideProvider(CUSTODY_LEDGER)
			.useValue(ledger)
			.overrideProvider(ATTESTATION_GATEWAY)
			.useValue(attestations)
			.compile();

		app = moduleFixture.createNestApplication();
		configureApp(app);
		await app.init();
	});

	afterEach(async () => {
		await app.close();
	});

	const deposit = (amount = "100") =>
		postAs(app, CUSTOMER, "/api/v1/escrow/initialize", {
			shipper: SHIPPER,
			amount,
		});

	it("should release the deposit to the shipper once both milestones are attested", async () => {
		const released: FundsReleased[] = [];
		app.get(EventEmitter2).on(FUNDS_RELEASED_ID, (evt: FundsReleased) => {
			released.push(evt);
		});

		const initRes = await deposit().expect(201);
		expect(initRes.body.data).toEqual({
			owner: OWNER,
			schemaId: SCHEMA_ID,
			customer: CUSTOMER,
			shipper: SHIPPER,
			amount: "100",
			shipmentConfirmed: false,
			receiptConfirmed: false,
			phase: "initialized",
		});
		expect(ledger.balanceOf(CUSTOMER)).toBe(900n);
		expect(ledger.custodyBalance).toBe(100n);

		const shipmentRes = await postAs(app, SHIPPER, "/api/v1/escrow/shipment", {
			proofData: "0x01AB",
		}).expect(200);
		expect(shipmentRes.body.data.proofId).toBe("1");
		expect(shipmentRes.body.data.state.phase).toBe("shipment-confirmed");
		expect(attestations.records[0]).toEqual({
			schemaId: SCHEMA_ID,
			recipients: [SHIPPER, CUSTOMER],
			timestamp: expect.any(Number),
			payload: new Uint8Array([1, 171]),
			proofId: 1n,
		});

		const receiptRes = await postAs(app, CUSTOMER, "/api/v1/escrow/receipt", {
			proofData: "",
		}).expect(200);
		expect(receiptRes.body.data.proofId).toBe("2");
		expect(receiptRes.body.data.releasedAmount).toBe("100");
		expect(receiptRes.body.data.state.phase).toBe("uninitialized");

		expect(ledger.balanceOf(SHIPPER)).toBe(100n);
		expect(ledger.custodyBalance).toBe(0n);
		expect(released).toEqual([
			{
				eventId: expect.any(String),
				shipper: SHIPPER,
				amount: 100n,
				releasedAt: expect.any(String),
			},
		]);

		const stateRes = await request(app.getHttpServer())
			.get("/api/v1/escrow")
			.expect(200);
		expect(stateRes.body.data).toMatchObject({
			customer: null,
			shipper: null,
			amount: "0",
			phase: "uninitialized",
		});
	});

	it("should refund the customer when the owner cancels", async () => {
		await deposit().expect(201);

		await postAs(app, CUSTOMER, "/api/v1/escrow/cancel")
			.expect(403)
			.expect({
				statusCode: 403,
				error: "NotAuthorized",
				message: "Only the owner can cancel the escrow",
				details: { caller: CUSTOMER },
			});

		const cancelRes = await postAs(app, OWNER, "/api/v1/escrow/cancel").expect(
			200,
		);
		expect(cancelRes.body.data.phase).toBe("uninitialized");
		expect(ledger.balanceOf(CUSTOMER)).toBe(1_000n);

		const againRes = await deposit("250").expect(201);
		expect(againRes.body.data).toMatchObject({
			customer: CUSTOMER,
			shipper: SHIPPER,
			amount: "250",
			phase: "initialized",
		});
	});

	it("should release funds even when an event listener fails", async () => {
		const events = app.get(EventEmitter2);
		const released: FundsReleased[] = [];
		events.on(RECEIPT_CONFIRMED_ID, () => {
			throw new Error("monitor down");
		});
		events.on(FUNDS_RELEASED_ID, (evt: FundsReleased) => {
			released.push(evt);
		});

		await deposit().expect(201);
		await postAs(app, SHIPPER, "/api/v1/escrow/shipment", {
			proofData: "0x01",
		}).expect(200);

		const res = await postAs(app, CUSTOMER, "/api/v1/escrow/receipt", {
			proofData: "0x02",
		}).expect(200);

		expect(res.body.data.state.phase).toBe("uninitialized");
		expect(ledger.balanceOf(SHIPPER)).toBe(100n);
		expect(released).toHaveLength(1);
	});

	it("should require a bearer token", async () => {
		await request(app.getHttpServer())
			.post("/api/v1/escrow/initialize")
			.send({ shipper: SHIPPER, amount: "100" })
			.expect(401);
	});

	it("should reject a zero deposit", async () => {
		await deposit("0")
			.expect(400)
			.expect({
				statusCode: 400,
				error: "InvalidAmount",
				message: "Deposit amount must be greater than zero, got 0",
				details: { amount: "0" },
			});
	});

	it("should reject a malformed body", async () => {
		await postAs(app, CUSTOMER, "/api/v1/escrow/initialize", {
			shipper: "not-a-key",
			amount: "100",
		}).expect(400);
		await postAs(app, CUSTOMER, "/api/v1/escrow/initialize", {
			shipper: SHIPPER,
			amount: "-5",
		}).expect(400);
	});

	it("should reject a second deposit while an escrow is open", async () => {
		await deposit().expect(201);

		const res = await deposit().expect(409);
		expect(res.body.error).toBe("AlreadyInitialized");
	});

	it("should only let the shipper confirm shipment", async () => {
		await deposit().expect(201);

		const res = await postAs(app, CUSTOMER, "/api/v1/escrow/shipment", {
			proofData: "0x00",
		}).expect(403);
		expect(res.body.error).toBe("NotAuthorized");
		expect(attestations.records).toHaveLength(0);
	});

	it("should refuse receipt before shipment", async () => {
		await deposit().expect(201);

		const res = await postAs(app, CUSTOMER, "/api/v1/escrow/receipt", {
			proofData: "0x00",
		}).expect(409);
		expect(res.body.error).toBe("InvalidState");
	});

	it("should keep the escrow open when the deposit cannot be collected", async () => {
		const res = await deposit("5000").expect(502);
		expect(res.body.error).toBe("TransferFailed");

		const stateRes = await request(app.getHttpServer())
			.get("/api/v1/escrow")
			.expect(200);
		expect(stateRes.body.data.phase).toBe("uninitialized");
		expect(ledger.balanceOf(CUSTOMER)).toBe(1_000n);
	});

	it("should keep funds in custody when the shipper cannot be paid", async () => {
		await deposit().expect(201);
		await postAs(app, SHIPPER, "/api/v1/escrow/shipment", {
			proofData: "0x01",
		}).expect(200);
		ledger.freeze(SHIPPER);

		const res = await postAs(app, CUSTOMER, "/api/v1/escrow/receipt", {
			proofData: "0x02",
		}).expect(502);
		expect(res.body).toEqual({
			statusCode: 502,
			error: "TransferFailed",
			message: `Could not release 100 to ${SHIPPER}`,
			details: { to: SHIPPER, amount: "100", ledgerCode: "ACCOUNT_FROZEN" },
		});

		const stateRes = await request(app.getHttpServer())
			.get("/api/v1/escrow")
			.expect(200);
		expect(stateRes.body.data).toMatchObject({
			amount: "100",
			shipmentConfirmed: true,
			receiptConfirmed: false,
			phase: "shipment-confirmed",
		});
		expect(ledger.custodyBalance).toBe(100n);
	});

	it("should report the escrow phase in the health check", async () => {
		await deposit().expect(201);

		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body.status).toBe("ok");
		expect(res.body.escrowPhase).toBe("initialized");
	});
});
