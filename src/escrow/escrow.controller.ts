import {
	Body,
	Controller,
	Get,
	HttpCode,
	Post,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadGatewayResponse,
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { hex } from "@scure/base";
import { map, Observable } from "rxjs";

import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { PublicKey } from "../common/PublicKey";
import {
	EscrowSse,
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import {
	ConfirmMilestoneInDto,
	ConfirmMilestoneOutDto,
} from "./dto/confirm-milestone.dto";
import { GetEscrowDto } from "./dto/get-escrow.dto";
import { InitializeEscrowInDto } from "./dto/initialize-escrow.dto";
import { EscrowEngineService } from "./escrow-engine.service";
import { EscrowSnapshot } from "./escrow-state";

type MilestoneResult = { proofId: string; releasedAmount?: string; state: EscrowSnapshot };

@ApiTags("Escrow")
@ApiExtraModels(ApiEnvelopeShellDto, GetEscrowDto, ConfirmMilestoneOutDto)
@Controller("api/v1/escrow")
export class EscrowController {
	constructor(
		private readonly engine: EscrowEngineService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "Current escrow state" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	getState(): ApiEnvelope<EscrowSnapshot> {
		return envelope(this.engine.snapshot());
	}

	@Post("initialize")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Deposit funds and open an escrow for a shipper" })
	@ApiBody({ type: InitializeEscrowInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiBadRequestResponse({ description: "Invalid amount or parties" })
	@ApiConflictResponse({ description: "An escrow is already in progress" })
	@ApiBadGatewayResponse({ description: "Deposit could not be collected" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async initialize(
		@Caller() caller: PublicKey,
		@Body() dto: InitializeEscrowInDto,
	): Promise<ApiEnvelope<EscrowSnapshot>> {
		const state = await this.engine.initialize(
			caller,
			dto.shipper,
			BigInt(dto.amount),
		);
		return envelope(state);
	}

	@Post("shipment")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Shipper records proof of shipment" })
	@ApiBody({ type: ConfirmMilestoneInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ConfirmMilestoneOutDto) })
	@ApiForbiddenResponse({ description: "Caller is not the shipper" })
	@ApiConflictResponse({ description: "Escrow is not awaiting shipment" })
	@ApiBadGatewayResponse({ description: "No proof was recorded" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async confirmShipment(
		@Caller() caller: PublicKey,
		@Body() dto: ConfirmMilestoneInDto,
	): Promise<ApiEnvelope<MilestoneResult>> {
		const { proofId, state } = await this.engine.confirmShipment(
			caller,
			decodeProofData(dto.proofData),
		);
		return envelope({ proofId: proofId.toString(), state });
	}

	@Post("receipt")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "Customer records proof of receipt, releasing funds to the shipper",
	})
	@ApiBody({ type: ConfirmMilestoneInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ConfirmMilestoneOutDto) })
	@ApiForbiddenResponse({ description: "Caller is not the customer" })
	@ApiConflictResponse({ description: "Shipment not yet confirmed" })
	@ApiBadGatewayResponse({
		description: "No proof was recorded or funds could not be released",
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async confirmReceipt(
		@Caller() caller: PublicKey,
		@Body() dto: ConfirmMilestoneInDto,
	): Promise<ApiEnvelope<MilestoneResult>> {
		const { proofId, releasedAmount, state } = await this.engine.confirmReceipt(
			caller,
			decodeProofData(dto.proofData),
		);
		return envelope({
			proofId: proofId.toString(),
			releasedAmount: releasedAmount.toString(),
			state,
		});
	}

	@Post("cancel")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Owner cancels before shipment, refunding the customer" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiConflictResponse({ description: "Nothing to cancel or already shipped" })
	@ApiBadGatewayResponse({ description: "Refund could not be paid out" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async cancel(@Caller() caller: PublicKey): Promise<ApiEnvelope<EscrowSnapshot>> {
		return envelope(await this.engine.cancelEscrow(caller));
	}

	@Sse("events")
	@ApiOperation({ summary: "Stream of escrow events" })
	events(): Observable<SseEvent<EscrowSse>> {
		return this.sseService.escrowEvents.pipe(map((data) => ({ data })));
	}
}

function decodeProofData(value: string): Uint8Array {
	const digits = value.startsWith("0x") ? value.slice(2) : value;
	return hex.decode(digits.toLowerCase());
}
