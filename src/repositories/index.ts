import type { Database } from "../config/database.ts";
import type { ArticleRepository } from "./articleRepository.ts";
import { DrizzleArticleRepository } from "./drizzle/articleRepository.ts";
import { DrizzleLockoutStore } from "./drizzle/lockoutStore.ts";
import { DrizzleReportRepository } from "./drizzle/reportRepository.ts";
import { DrizzleSecurityEventRepository } from "./drizzle/securityEventRepository.ts";
import { DrizzleStorageProbe } from "./drizzle/storageProbe.ts";
import { DrizzleUserRepository } from "./drizzle/userRepository.ts";
import type { LockoutStore } from "./lockoutStore.ts";
import { MemoryArticleRepository } from "./memory/articleRepository.ts";
import { MemoryLockoutStore } from "./memory/lockoutStore.ts";
import { MemoryReportRepository } from "./memory/reportRepository.ts";
import { MemorySecurityEventRepository } from "./memory/securityEventRepository.ts";
import { MemoryStorageProbe } from "./memory/storageProbe.ts";
import { MemoryUserRepository } from "./memory/userRepository.ts";
import type { ReportRepository } from "./reportRepository.ts";
import type { SecurityEventRepository } from "./securityEventRepository.ts";
import type { StorageProbe } from "./storageProbe.ts";
import type { UserRepository } from "./userRepository.ts";

export interface Repositories {
	users: UserRepository;
	lockouts: LockoutStore;
	securityEvents: SecurityEventRepository;
	articles: ArticleRepository;
	reports: ReportRepository;
	probe: StorageProbe;
}

export const createDrizzleRepositories = (db: Database): Repositories => ({
	users: new DrizzleUserRepository(db),
	lockouts: new DrizzleLockoutStore(db),
	securityEvents: new DrizzleSecurityEventRepository(db),
	articles: new DrizzleArticleRepository(db),
	reports: new DrizzleReportRepository(db),
	probe: new DrizzleStorageProbe(db),
});

export const createMemoryRepositories = (): Repositories => {
	const users = new MemoryUserRepository();
	const articles = new MemoryArticleRepository();

	return {
		users,
		lockouts: new MemoryLockoutStore(),
		securityEvents: new MemorySecurityEventRepository(),
		articles,
		reports: new MemoryReportRepository(articles, users),
		probe: new MemoryStorageProbe(),
	};
};
