import type { AppConfig } from "../config/env.ts";
import { StorageDrivers } from "../config/env.ts";
import { createDatabase } from "../config/database.ts";
import authMiddlewareCreator from "../middleware/authMiddleware.ts";
import type { AuthGuard } from "../middleware/authMiddleware.ts";
import { createSecurityMiddlewares } from "../middleware/securityMiddleware.ts";
import {
	createDrizzleRepositories,
	createMemoryRepositories,
} from "../repositories/index.ts";
import type { Repositories } from "../repositories/index.ts";
import { createArticleRouter } from "../routes/articles.ts";
import { createAuthRouter } from "../routes/auth.ts";
import { createHealthRouter } from "../routes/health.ts";
import { createReportRouter } from "../routes/reports.ts";
import { createSecurityEventRouter } from "../routes/securityEvents.ts";
import { createUserRouter } from "../routes/users.ts";
import { AuthService } from "../services/auth/authService.ts";
import { LockoutTracker } from "../services/auth/lockoutTracker.ts";
import { HealthService } from "../services/healthService.ts";
import { SecurityEventService } from "../services/securityEventService.ts";
import type { Clock } from "../utils/clock.ts";
import { systemClock } from "../utils/clock.ts";
import { createPasswordHasher } from "../utils/hashingTools.ts";
import type { PasswordHasher } from "../utils/hashingTools.ts";
import { TokenService } from "../utils/jwt.ts";
import Server from "./server.ts";
import type { Route } from "./server.ts";

export interface AppContext {
	config: AppConfig;
	clock: Clock;
	repositories: Repositories;
	hasher: PasswordHasher;
	tokens: TokenService;
	lockout: LockoutTracker;
	securityEvents: SecurityEventService;
	authService: AuthService;
	healthService: HealthService;
	requireAuth: AuthGuard;
}

export interface AppContextOverrides {
	repositories?: Repositories;
	clock?: Clock;
}

export function createRepositories(config: AppConfig): Repositories {
	if (config.storage.driver === StorageDrivers.MEMORY) {
		return createMemoryRepositories();
	}
	return createDrizzleRepositories(createDatabase(config.storage.databaseUrl));
}

export function createAppContext(
	config: AppConfig,
	{ repositories = createRepositories(config), clock = systemClock }: AppContextOverrides = {}
): AppContext {
	const hasher = createPasswordHasher(config.auth.hashingSaltRounds);
	const tokens = new TokenService({
		secret: config.auth.jwtSecret,
		lifetimeSeconds: config.auth.tokenLifetimeSeconds,
		clock,
	});
	const lockout = new LockoutTracker({
		store: repositories.lockouts,
		policy: {
			threshold: config.auth.lockoutThreshold,
			durationMs: config.auth.lockoutDurationMs,
		},
		clock,
	});
	const securityEvents = new SecurityEventService(repositories.securityEvents, clock);
	const authService = new AuthService({
		users: repositories.users,
		hasher,
		lockout,
		tokens,
		securityEvents,
		clock,
	});
	const healthService = new HealthService(
		repositories,
		{ name: config.service.name, version: config.service.version, environment: config.env },
		clock
	);

	return {
		config,
		clock,
		repositories,
		hasher,
		tokens,
		lockout,
		securityEvents,
		authService,
		healthService,
		requireAuth: authMiddlewareCreator(authService),
	};
}

export function createRoutes(context: AppContext): Route[] {
	const { repositories, requireAuth } = context;

	return [
		{
			path: "/api/health",
			handlers: [createHealthRouter(context.healthService)],
		},
		{
			path: "/api/auth",
			handlers: [
				createAuthRouter({
					authService: context.authService,
					users: repositories.users,
					requireAuth,
				}),
			],
		},
		{
			path: "/api/articles",
			handlers: [
				createArticleRouter({
					articles: repositories.articles,
					reports: repositories.reports,
					requireAuth,
				}),
			],
		},
		{
			path: "/api/reports",
			handlers: [
				createReportRouter({
					reports: repositories.reports,
					articles: repositories.articles,
					users: repositories.users,
					requireAuth,
				}),
			],
		},
		{
			path: "/api/users",
			handlers: [
				createUserRouter({
					users: repositories.users,
					hasher: context.hasher,
					requireAuth,
				}),
			],
		},
		{
			path: "/api/security-events",
			handlers: [
				createSecurityEventRouter({
					securityEvents: context.securityEvents,
					requireAuth,
				}),
			],
		},
	];
}

export function createServer(context: AppContext): Server {
	return new Server({
		name: context.config.service.name,
		routes: createRoutes(context),
		security: createSecurityMiddlewares(context.config),
		accessLog: context.config.env !== "test",
	});
}
