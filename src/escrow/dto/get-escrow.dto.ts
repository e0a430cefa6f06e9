import { ApiProperty } from "@nestjs/swagger";

import { EscrowPhase, EscrowSnapshot } from "../escrow-state";

export class GetEscrowDto implements EscrowSnapshot {
	@ApiProperty({ description: "Public key allowed to cancel the escrow" })
	owner!: string;

	@ApiProperty({ description: "Attestation schema for milestone proofs" })
	schemaId!: string;

	@ApiProperty({ type: "string", nullable: true })
	customer!: string | null;

	@ApiProperty({ type: "string", nullable: true })
	shipper!: string | null;

	@ApiProperty({ description: "Custodied amount", example: "100000" })
	amount!: string;

	@ApiProperty()
	shipmentConfirmed!: boolean;

	@ApiProperty()
	receiptConfirmed!: boolean;

	@ApiProperty({
		enum: ["uninitialized", "initialized", "shipment-confirmed"],
	})
	phase!: EscrowPhase;
}
