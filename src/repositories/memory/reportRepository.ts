import { ReportStatuses } from "../../db/index.ts";
import type { Report } from "../../db/index.ts";
import type { ArticleRepository } from "../articleRepository.ts";
import type {
	NewReportData,
	ReportChanges,
	ReportFilters,
	ReportRepository,
	ReportWithRelations,
} from "../reportRepository.ts";
import type { UserRepository } from "../userRepository.ts";
import { newestFirst } from "./ordering.ts";

/**
 * Resolves article and user relations through the sibling memory
 * repositories, the way the SQL implementation joins them.
 */
export class MemoryReportRepository implements ReportRepository {
	private readonly reports = new Map<number, Report>();
	private nextId = 1;

	constructor(
		private readonly articles: ArticleRepository,
		private readonly users: UserRepository
	) {}

	async list({ userId, status }: ReportFilters): Promise<ReportWithRelations[]> {
		const matching = [...this.reports.values()]
			.filter((report) => userId === undefined || report.userId === userId)
			.filter((report) => !status || report.status === status)
			.sort(newestFirst);

		const results: ReportWithRelations[] = [];
		for (const report of matching) {
			const [article, user] = await Promise.all([
				this.articles.findById(report.articleId),
				this.users.findById(report.userId),
			]);
			if (!article || !user) continue;

			results.push({
				...report,
				article: {
					id: article.id,
					code: article.code,
					name: article.name,
					type: article.type,
					status: article.status,
				},
				user: { id: user.id, username: user.username, fullName: user.fullName },
			});
		}
		return results;
	}

	async findById(id: number): Promise<Report | null> {
		const report = this.reports.get(id);
		return report ? { ...report } : null;
	}

	async create(data: NewReportData): Promise<Report> {
		const report: Report = {
			...data,
			id: this.nextId++,
			status: ReportStatuses.PENDING,
			adminResponse: null,
			createdAt: new Date(),
			updatedAt: null,
		};
		this.reports.set(report.id, report);
		return { ...report };
	}

	async update(id: number, changes: ReportChanges): Promise<Report | null> {
		const existing = this.reports.get(id);
		if (!existing) return null;

		const updated: Report = { ...existing, ...changes };
		this.reports.set(id, updated);
		return { ...updated };
	}

	async delete(id: number): Promise<boolean> {
		return this.reports.delete(id);
	}

	async countByArticle(articleId: number): Promise<number> {
		return [...this.reports.values()].filter((report) => report.articleId === articleId)
			.length;
	}

	async count(filters: { createdSince?: Date } = {}): Promise<number> {
		const since = filters.createdSince;
		return [...this.reports.values()].filter(
			(report) => !since || report.createdAt >= since
		).length;
	}
}
