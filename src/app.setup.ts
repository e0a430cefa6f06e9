import { INestApplication, ValidationPipe } from "@nestjs/common";

import { EscrowExceptionFilter } from "./common/filters/escrow-exception.filter";

/**
 * Pipes and filters shared by the server and the end-to-end tests.
 */
export function configureApp(app: INestApplication): void {
	// biome-ignore lint/correctness/useHookAtTopLevel: backend
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	// biome-ignore lint/correctness/useHookAtTopLevel: backend
	app.useGlobalFilters(new EscrowExceptionFilter());
}
