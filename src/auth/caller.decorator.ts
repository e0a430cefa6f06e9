import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";

import { PublicKey } from "../common/PublicKey";
import { AuthenticatedRequest } from "./auth.guard";

/**
 * Public key of the caller resolved by {@link AuthGuard}.
 */
export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): PublicKey => {
		const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!request.caller) {
			throw new UnauthorizedException("No authenticated caller");
		}
		return request.caller;
	},
);
