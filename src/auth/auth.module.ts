import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { JwtModule } from "@nestjs/jwt";

import { AuthGuard } from "./auth.guard";

@Module({
	imports: [
		JwtModule.registerAsync({
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const secret = cfg.get<string>("JWT_SECRET");
				if (!secret) {
					throw new Error("JWT_SECRET is not set");
				}
				return {
					secret,
					signOptions: { expiresIn: "1h" },
					verifyOptions: { algorithms: ["HS256"] },
				};
			},
		}),
	],
	providers: [AuthGuard],
	exports: [AuthGuard, JwtModule],
})
export class AuthModule {}
