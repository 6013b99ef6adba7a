import type { Article, Report, ReportStatus, ReportType, User } from "../db/index.ts";

export interface ReportWithRelations extends Report {
	article: Pick<Article, "id" | "code" | "name" | "type" | "status">;
	user: Pick<User, "id" | "username" | "fullName">;
}

export interface NewReportData {
	articleId: number;
	userId: number;
	reportType: ReportType;
	message: string;
}

export type ReportChanges = Partial<Pick<Report, "status" | "adminResponse" | "updatedAt">>;

export interface ReportFilters {
	userId?: number;
	status?: ReportStatus;
}

export interface ReportRepository {
	/** Newest first */
	list(filters: ReportFilters): Promise<ReportWithRelations[]>;
	findById(id: number): Promise<Report | null>;
	create(data: NewReportData): Promise<Report>;
	update(id: number, changes: ReportChanges): Promise<Report | null>;
	delete(id: number): Promise<boolean>;
	countByArticle(articleId: number): Promise<number>;
	count(filters?: { createdSince?: Date }): Promise<number>;
}
