import { loadConfig, StorageDrivers } from "../config/env.ts";
import { loadEnvFile } from "../config/loadEnv.ts";
import { seedAdmin } from "../services/users/seedAdmin.ts";
import { logger, setLogLevel } from "../utils/logger.ts";
import { createAppContext, createServer } from "./container.ts";

async function main() {
	const envFile = loadEnvFile();
	const config = loadConfig();
	setLogLevel(config.logLevel);

	if (envFile) {
		logger.info("Loaded environment file", { path: envFile });
	} else {
		logger.warn("No .env.local found, using process environment");
	}

	const context = createAppContext(config);

	// Memory storage starts empty; give it an administrator to log in with
	if (config.storage.driver === StorageDrivers.MEMORY && config.adminSeed) {
		await seedAdmin(context.repositories.users, context.hasher, config.adminSeed);
	}

	const server = await createServer(context).start(config.port);

	process.on("SIGTERM", () => {
		logger.info("SIGTERM received. Shutting down gracefully...");
		server.close(() => {
			logger.info("Server closed.");
		});
	});
}

main().catch((error: unknown) => {
	logger.error("Failed to start server", error);
	process.exit(1);
});
