/**
 * Application configuration
 * Validates environment variables once at startup and applies defaults
 */

import { z } from "zod";

export const StorageDrivers = {
	POSTGRES: "postgres",
	MEMORY: "memory",
} as const;

export type StorageDriver = (typeof StorageDrivers)[keyof typeof StorageDrivers];

const DEV_JWT_SECRET = "dev-secret-key";

const numberFromEnv = (valueName: string, defaultValue: number, min = 0) =>
	z.coerce
		.number({ invalid_type_error: `${valueName} should be number` })
		.int(`${valueName} should be an integer`)
		.min(min, `${valueName} should be at least ${min}`)
		.default(defaultValue);

const EnvSchema = z
	.object({
		NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
		PORT: numberFromEnv("PORT", 3001),
		LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
		SERVICE_NAME: z.string().min(1).default("plant-inventory-api"),
		SERVICE_VERSION: z.string().min(1).default("1.0.0"),

		STORAGE_DRIVER: z
			.enum([StorageDrivers.POSTGRES, StorageDrivers.MEMORY])
			.default(StorageDrivers.POSTGRES),
		DATABASE_URL: z.string().min(1).optional(),

		JWT_SECRET: z.string().min(1).default(DEV_JWT_SECRET),
		TOKEN_LIFETIME_HOURS: numberFromEnv("TOKEN_LIFETIME_HOURS", 24, 1),
		LOCKOUT_THRESHOLD: numberFromEnv("LOCKOUT_THRESHOLD", 5, 1),
		LOCKOUT_DURATION_MINUTES: numberFromEnv("LOCKOUT_DURATION_MINUTES", 15, 1),
		HASHING_SALT_ROUNDS: numberFromEnv("HASHING_SALT_ROUNDS", 10, 4),

		CORS_ALLOWED_ORIGINS: z.string().default("http://localhost:3000"),
		RATE_LIMIT_WINDOW_MS: numberFromEnv("RATE_LIMIT_WINDOW_MS", 60 * 1000, 1),
		RATE_LIMIT_MAX: numberFromEnv("RATE_LIMIT_MAX", 100, 1),

		ADMIN_USERNAME: z.string().min(1).optional(),
		ADMIN_EMAIL: z.string().email().optional(),
		ADMIN_PASSWORD: z.string().min(8).optional(),
	})
	.superRefine((env, ctx) => {
		if (env.STORAGE_DRIVER === StorageDrivers.POSTGRES && !env.DATABASE_URL) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["DATABASE_URL"],
				message: "DATABASE_URL is required when STORAGE_DRIVER is postgres",
			});
		}
		if (env.NODE_ENV === "production" && env.JWT_SECRET === DEV_JWT_SECRET) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["JWT_SECRET"],
				message: "JWT_SECRET must be set in production",
			});
		}
	});

export type Env = z.infer<typeof EnvSchema>;

export interface AdminSeed {
	username: string;
	email: string;
	password: string;
}

export interface AppConfig {
	env: Env["NODE_ENV"];
	port: number;
	logLevel: Env["LOG_LEVEL"];
	service: {
		name: string;
		version: string;
	};
	storage: {
		driver: StorageDriver;
		databaseUrl?: string;
	};
	auth: {
		jwtSecret: string;
		tokenLifetimeSeconds: number;
		lockoutThreshold: number;
		lockoutDurationMs: number;
		hashingSaltRounds: number;
	};
	http: {
		corsAllowedOrigins: string[];
		rateLimitWindowMs: number;
		rateLimitMax: number;
	};
	adminSeed?: AdminSeed;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = EnvSchema.safeParse(source);
	if (!parsed.success) {
		const details = Object.entries(parsed.error.flatten().fieldErrors)
			.map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
			.join("; ");
		throw new Error(`Invalid configuration: ${details}`);
	}

	const env = parsed.data;
	const adminSeed =
		env.ADMIN_USERNAME && env.ADMIN_EMAIL && env.ADMIN_PASSWORD
			? {
					username: env.ADMIN_USERNAME,
					email: env.ADMIN_EMAIL,
					password: env.ADMIN_PASSWORD,
				}
			: undefined;

	return {
		env: env.NODE_ENV,
		port: env.PORT,
		logLevel: env.LOG_LEVEL,
		service: {
			name: env.SERVICE_NAME,
			version: env.SERVICE_VERSION,
		},
		storage: {
			driver: env.STORAGE_DRIVER,
			databaseUrl: env.DATABASE_URL,
		},
		auth: {
			jwtSecret: env.JWT_SECRET,
			tokenLifetimeSeconds: env.TOKEN_LIFETIME_HOURS * 60 * 60,
			lockoutThreshold: env.LOCKOUT_THRESHOLD,
			lockoutDurationMs: env.LOCKOUT_DURATION_MINUTES * 60 * 1000,
			hashingSaltRounds: env.HASHING_SALT_ROUNDS,
		},
		http: {
			corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS.split(",")
				.map((o) => o.trim())
				.filter(Boolean),
			rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,
			rateLimitMax: env.RATE_LIMIT_MAX,
		},
		adminSeed,
	};
}
