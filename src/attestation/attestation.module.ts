import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios from "axios";

import { ATTESTATION_GATEWAY } from "./attestation.constants";
import { AttestationGateway } from "./attestation.gateway";
import { HttpAttestationGateway } from "./http-attestation.gateway";
import { InMemoryAttestationGateway } from "./in-memory-attestation.gateway";

@Module({
	providers: [
		{
			provide: ATTESTATION_GATEWAY,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService): AttestationGateway => {
				const driver = cfg.get<string>("ATTESTATION_DRIVER") ?? "memory";
				Logger.log(`ATTESTATION_DRIVER=${driver}`, "AttestationModule");
				switch (driver) {
					case "memory":
						return new InMemoryAttestationGateway();
					case "http": {
						const baseURL = cfg.get<string>("ATTESTATION_SERVICE_URL");
						if (!baseURL) {
							throw new Error(
								"ATTESTATION_SERVICE_URL is required when ATTESTATION_DRIVER=http",
							);
						}
						const rawTimeout = cfg.get<string>("ATTESTATION_TIMEOUT_MS") ?? "10000";
						if (!/^\d+$/.test(rawTimeout) || Number(rawTimeout) === 0) {
							throw new Error(
								`ATTESTATION_TIMEOUT_MS must be a positive integer, got "${rawTimeout}"`,
							);
						}
						const timeout = Number(rawTimeout);
						Logger.log(`ATTESTATION_SERVICE_URL=${baseURL}`, "AttestationModule");
						return new HttpAttestationGateway(
							axios.create({ baseURL, timeout }),
						);
					}
					default:
						throw new Error(`Unknown ATTESTATION_DRIVER: ${driver}`);
				}
			},
		},
	],
	exports: [ATTESTATION_GATEWAY],
})
export class AttestationModule {}
