import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, IsString, Matches } from "class-validator";

export class InitializeEscrowInDto {
	@ApiProperty({
		description: "Public key of the shipper (x-only, hex)",
		example: "c8462d0e7e3bbfc1751df0d040e43c4aef37e17b554a8112849a94775bb50497",
	})
	@IsString()
	@Matches(/^[0-9a-fA-F]{64}$/, {
		message: "shipper must be a 32-byte hex public key",
	})
	shipper!: string;

	@ApiProperty({
		description: "Deposit taken into custody, as a decimal integer string",
		example: "100000",
	})
	@IsNumberString({ no_symbols: true })
	amount!: string;
}
