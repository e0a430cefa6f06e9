import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpStatus,
} from "@nestjs/common";
import type { Response } from "express";

import { EscrowError, EscrowErrorKind } from "../errors";

export const STATUS_BY_KIND: Record<EscrowErrorKind, HttpStatus> = {
	InvalidAmount: HttpStatus.BAD_REQUEST,
	InvalidParty: HttpStatus.BAD_REQUEST,
	NotAuthorized: HttpStatus.FORBIDDEN,
	AlreadyInitialized: HttpStatus.CONFLICT,
	InvalidState: HttpStatus.CONFLICT,
	AttestationFailed: HttpStatus.BAD_GATEWAY,
	TransferFailed: HttpStatus.BAD_GATEWAY,
};

@Catch(EscrowError)
export class EscrowExceptionFilter implements ExceptionFilter<EscrowError> {
	catch(exception: EscrowError, host: ArgumentsHost) {
		const response = host.switchToHttp().getResponse<Response>();
		const statusCode = STATUS_BY_KIND[exception.kind];
		response.status(statusCode).json({
			statusCode,
			error: exception.kind,
			message: exception.message,
			...(exception.details ? { details: exception.details } : {}),
		});
	}
}
