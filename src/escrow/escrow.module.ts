import { Module } from "@nestjs/common";

import { AttestationModule } from "../attestation/attestation.module";
import { AuthModule } from "../auth/auth.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { CustodyModule } from "../custody/custody.module";
import { EscrowController } from "./escrow.controller";
import { EscrowEngineService } from "./escrow-engine.service";

@Module({
	imports: [AttestationModule, CustodyModule, AuthModule],
	providers: [EscrowEngineService, ServerSentEventsService],
	controllers: [EscrowController],
	exports: [EscrowEngineService],
})
export class EscrowModule {}
