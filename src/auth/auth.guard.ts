import {
	CanActivate,
	ExecutionContext,
	Injectable,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import type { Request } from "express";

import {
	isPublicKey,
	normalizePublicKey,
	PublicKey,
} from "../common/PublicKey";

export type AuthenticatedRequest = Request & { caller?: PublicKey };

type CallerClaims = { sub?: unknown };

/**
 * Resolves the caller from a bearer JWT whose `sub` is the caller's
 * public key.
 */
@Injectable()
export class AuthGuard implements CanActivate {
	private readonly logger = new Logger(AuthGuard.name);

	constructor(private readonly jwt: JwtService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const token = extractBearerToken(request.header("authorization"));
		if (!token) {
			throw new UnauthorizedException("Missing bearer token");
		}

		let claims: CallerClaims;
		try {
			claims = await this.jwt.verifyAsync<CallerClaims>(token);
		} catch (e) {
			this.logger.debug(`Invalid token: ${e instanceof Error ? e.message : e}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (!isPublicKey(claims.sub)) {
			throw new UnauthorizedException("Token subject is not a public key");
		}
		request.caller = normalizePublicKey(claims.sub);
		return true;
	}
}

export function extractBearerToken(header: string | undefined): string | null {
	if (!header || !header.startsWith("Bearer ")) {
		return null;
	}
	const token = header.slice("Bearer ".length).trim();
	return token.length > 0 ? token : null;
}
