import type { Repositories } from "../repositories/index.ts";
import type { Clock } from "../utils/clock.ts";
import { systemClock } from "../utils/clock.ts";
import { UserStatuses } from "../db/index.ts";

const RECENT_ACTIVITY_WINDOW_MS = 24 * 60 * 60 * 1000;

export const HealthStatuses = {
	HEALTHY: "HEALTHY",
	DEGRADED: "DEGRADED",
	UNHEALTHY: "UNHEALTHY",
} as const;

export type HealthStatus = (typeof HealthStatuses)[keyof typeof HealthStatuses];

export interface ServiceInfo {
	name: string;
	version: string;
	environment: string;
}

export interface StorageCheck {
	driver: string;
	connected: boolean;
	message: string;
}

export interface StorageStatistics {
	totalArticles: number;
	totalUsers: number;
	totalReports: number;
	activeUsers: number;
}

export interface DetailedHealth {
	environment: string;
	healthStatus: HealthStatus;
	storage: StorageCheck;
	entities: {
		articles: number;
		users: number;
		reports: number;
		recentActivity24h: number;
	};
	error?: string;
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export class HealthService {
	constructor(
		private readonly repositories: Repositories,
		private readonly info: ServiceInfo,
		private readonly clock: Clock = systemClock
	) {}

	liveness() {
		return {
			status: "OK",
			service: this.info.name,
			version: this.info.version,
			timestamp: this.clock().toISOString(),
		};
	}

	async checkStorage(): Promise<StorageCheck> {
		const { probe } = this.repositories;
		try {
			await probe.ping();
			return { driver: probe.driver, connected: true, message: "Connection successful" };
		} catch (error) {
			return { driver: probe.driver, connected: false, message: errorMessage(error) };
		}
	}

	async statistics(): Promise<StorageStatistics> {
		const { articles, users, reports } = this.repositories;
		const [totalArticles, totalUsers, totalReports, activeUsers] = await Promise.all([
			articles.count(),
			users.count(),
			reports.count(),
			users.count({ status: UserStatuses.ACTIVE }),
		]);
		return { totalArticles, totalUsers, totalReports, activeUsers };
	}

	async detailed(): Promise<DetailedHealth> {
		const storage = await this.checkStorage();
		const health: DetailedHealth = {
			environment: this.info.environment,
			healthStatus: storage.connected ? HealthStatuses.HEALTHY : HealthStatuses.UNHEALTHY,
			storage,
			entities: { articles: 0, users: 0, reports: 0, recentActivity24h: 0 },
		};
		if (!storage.connected) return health;

		try {
			const { articles, users, reports } = this.repositories;
			const since = new Date(this.clock().getTime() - RECENT_ACTIVITY_WINDOW_MS);
			const [articleCount, userCount, reportCount, recentReports] = await Promise.all([
				articles.count(),
				users.count(),
				reports.count(),
				reports.count({ createdSince: since }),
			]);
			health.entities = {
				articles: articleCount,
				users: userCount,
				reports: reportCount,
				recentActivity24h: recentReports,
			};
		} catch (error) {
			health.healthStatus = HealthStatuses.DEGRADED;
			health.error = errorMessage(error);
		}
		return health;
	}
}
