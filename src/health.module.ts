import { Module } from "@nestjs/common";

import { EscrowModule } from "./escrow/escrow.module";
import { HealthController } from "./health.controller";

@Module({
	imports: [EscrowModule],
	controllers: [HealthController],
})
export class HealthModule {}
