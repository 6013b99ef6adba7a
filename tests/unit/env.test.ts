import { describe, expect, it } from "vitest";

import { loadConfig, StorageDrivers } from "../../src/config/env.ts";

describe("loadConfig", () => {
	it("applies defaults", () => {
		const config = loadConfig({ STORAGE_DRIVER: "memory" });

		expect(config).toEqual({
			env: "development",
			port: 3001,
			logLevel: "info",
			service: { name: "plant-inventory-api", version: "1.0.0" },
			storage: { driver: StorageDrivers.MEMORY, databaseUrl: undefined },
			auth: {
				jwtSecret: "dev-secret-key",
				tokenLifetimeSeconds: 24 * 60 * 60,
				lockoutThreshold: 5,
				lockoutDurationMs: 15 * 60 * 1000,
				hashingSaltRounds: 10,
			},
			http: {
				corsAllowedOrigins: ["http://localhost:3000"],
				rateLimitWindowMs: 60000,
				rateLimitMax: 100,
			},
			adminSeed: undefined,
		});
	});

	it("coerces numeric settings", () => {
		const config = loadConfig({
			STORAGE_DRIVER: "memory",
			PORT: "8080",
			TOKEN_LIFETIME_HOURS: "2",
			LOCKOUT_THRESHOLD: "3",
			LOCKOUT_DURATION_MINUTES: "1",
		});

		expect(config.port).toBe(8080);
		expect(config.auth.tokenLifetimeSeconds).toBe(7200);
		expect(config.auth.lockoutThreshold).toBe(3);
		expect(config.auth.lockoutDurationMs).toBe(60000);
	});

	it("splits the CORS origin list", () => {
		const config = loadConfig({
			STORAGE_DRIVER: "memory",
			CORS_ALLOWED_ORIGINS: "http://plant.example, http://ops.plant.example,,",
		});

		expect(config.http.corsAllowedOrigins).toEqual([
			"http://plant.example",
			"http://ops.plant.example",
		]);
	});

	it("requires a database URL for postgres storage", () => {
		expect(() => loadConfig({})).toThrow(
			"Invalid configuration: DATABASE_URL: DATABASE_URL is required when STORAGE_DRIVER is postgres"
		);
	});

	it("refuses the development secret in production", () => {
		expect(() => loadConfig({ NODE_ENV: "production", STORAGE_DRIVER: "memory" })).toThrow(
			"JWT_SECRET must be set in production"
		);
	});

	it("rejects a hashing cost below the bcrypt minimum", () => {
		expect(() => loadConfig({ STORAGE_DRIVER: "memory", HASHING_SALT_ROUNDS: "3" })).toThrow(
			"HASHING_SALT_ROUNDS should be at least 4"
		);
	});

	it("builds the admin seed only when all three values are present", () => {
		expect(
			loadConfig({ STORAGE_DRIVER: "memory", ADMIN_USERNAME: "admin" }).adminSeed
		).toBeUndefined();
		expect(
			loadConfig({
				STORAGE_DRIVER: "memory",
				ADMIN_USERNAME: "admin",
				ADMIN_EMAIL: "admin@plant.example",
				ADMIN_PASSWORD: "admin-password",
			}).adminSeed
		).toEqual({
			username: "admin",
			email: "admin@plant.example",
			password: "admin-password",
		});
	});
});
