import "reflect-metadata";
import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

dotenv.config();

const LOG_LEVELS: readonly LogLevel[] = [
	"log",
	"error",
	"warn",
	"debug",
	"verbose",
	"fatal",
];

function logLevels(raw: string | undefined): LogLevel[] {
	if (!raw) {
		return ["log", "error", "warn"];
	}
	return LOG_LEVELS.filter((level) =>
		raw.split(",").some((entry) => entry.trim() === level),
	);
}

async function bootstrap() {
	const app = await NestFactory.create(AppModule, {
		logger: logLevels(process.env.LOG_LEVELS),
	});
	configureApp(app);
	app.enableShutdownHooks();

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
	Logger.error("Failed to start", err instanceof Error ? err.stack : String(err), "Bootstrap");
	process.exit(1);
});
