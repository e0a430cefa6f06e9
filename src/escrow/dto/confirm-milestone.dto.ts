import { ApiProperty } from "@nestjs/swagger";
import { IsString, Matches } from "class-validator";

export class ConfirmMilestoneInDto {
	@ApiProperty({
		description: "Proof payload recorded with the attestation, hex encoded",
		example: "0x7472616ba5",
	})
	@IsString()
	@Matches(/^(0x)?(?:[0-9a-fA-F]{2})*$/, {
		message: "proofData must be an even-length hex string",
	})
	proofData!: string;
}

export class ConfirmMilestoneOutDto {
	@ApiProperty({ description: "Id of the recorded proof", example: "42" })
	proofId!: string;

	@ApiProperty({
		description: "Amount released to the shipper, for receipt confirmations",
		required: false,
		example: "100000",
	})
	releasedAmount?: string;
}
