import { and, count, desc, eq, gte } from "drizzle-orm";
import type { SQL } from "drizzle-orm";

import type { Database } from "../../config/database.ts";
import { articles, reports, users } from "../../db/index.ts";
import type { Report } from "../../db/index.ts";
import type {
	NewReportData,
	ReportChanges,
	ReportFilters,
	ReportRepository,
	ReportWithRelations,
} from "../reportRepository.ts";

export class DrizzleReportRepository implements ReportRepository {
	constructor(private readonly db: Database) {}

	async list({ userId, status }: ReportFilters): Promise<ReportWithRelations[]> {
		const conditions: SQL[] = [];
		if (userId !== undefined) conditions.push(eq(reports.userId, userId));
		if (status) conditions.push(eq(reports.status, status));

		const rows = await this.db
			.select({
				report: reports,
				article: {
					id: articles.id,
					code: articles.code,
					name: articles.name,
					type: articles.type,
					status: articles.status,
				},
				user: {
					id: users.id,
					username: users.username,
					fullName: users.fullName,
				},
			})
			.from(reports)
			.innerJoin(articles, eq(reports.articleId, articles.id))
			.innerJoin(users, eq(reports.userId, users.id))
			.where(and(...conditions))
			.orderBy(desc(reports.createdAt), desc(reports.id));

		return rows.map(({ report, article, user }) => ({ ...report, article, user }));
	}

	async findById(id: number): Promise<Report | null> {
		const [report] = await this.db
			.select()
			.from(reports)
			.where(eq(reports.id, id))
			.limit(1);
		return report ?? null;
	}

	async create(data: NewReportData): Promise<Report> {
		const [report] = await this.db.insert(reports).values(data).returning();
		return report;
	}

	async update(id: number, changes: ReportChanges): Promise<Report | null> {
		const [report] = await this.db
			.update(reports)
			.set(changes)
			.where(eq(reports.id, id))
			.returning();
		return report ?? null;
	}

	async delete(id: number): Promise<boolean> {
		const deleted = await this.db
			.delete(reports)
			.where(eq(reports.id, id))
			.returning({ id: reports.id });
		return deleted.length > 0;
	}

	async countByArticle(articleId: number): Promise<number> {
		const [row] = await this.db
			.select({ value: count() })
			.from(reports)
			.where(eq(reports.articleId, articleId));
		return row?.value ?? 0;
	}

	async count(filters: { createdSince?: Date } = {}): Promise<number> {
		const [row] = await this.db
			.select({ value: count() })
			.from(reports)
			.where(filters.createdSince ? gte(reports.createdAt, filters.createdSince) : undefined);
		return row?.value ?? 0;
	}
}
