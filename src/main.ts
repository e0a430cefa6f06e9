import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";

import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);
	configureApp(app);
	app.enableCors();
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Shipment Escrow API")
		.setDescription("Custom header auth: `Authorization: Bearer <jwt>`")
		.setVersion("0.1.0")
		.addBearerAuth(
			{ type: "http", scheme: "bearer", bearerFormat: "JWT", in: "header" },
			"bearer",
		)
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
			persistAuthorization: true,
		},
	});

	const port = Number.parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
	Logger.error("Failed to start", err instanceof Error ? err.stack : err, "Bootstrap");
	process.exit(1);
});
