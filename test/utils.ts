import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";

export const OWNER = "a0".repeat(32);
export const CUSTOMER = "c1".repeat(32);
export const SHIPPER = "d2".repeat(32);
export const SCHEMA_ID = `0x${"ab".repeat(32)}`;

export function useTestEnvironment(): void {
	process.env.ESCROW_OWNER_PUBKEY = OWNER;
	process.env.ATTESTATION_SCHEMA_ID = SCHEMA_ID;
	process.env.ATTESTATION_DRIVER = "memory";
	process.env.JWT_SECRET = "test-secret";
}

export function tokenFor(app: INestApplication, pubkey: string): string {
	return app.get(JwtService).sign({ sub: pubkey });
}

export function postAs(
	app: INestApplication,
	pubkey: string,
	path: string,
	body: object = {},
) {
	return request(app.getHttpServer())
		.post(path)
		.set("Authorization", `Bearer ${tokenFor(app, pubkey)}`)
		.send(body);
}
