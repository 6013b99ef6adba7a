import {
	index,
	integer,
	pgEnum,
	pgTable,
	serial,
	text,
	timestamp,
} from "drizzle-orm/pg-core";
import { articles } from "./articles.ts";
import { users } from "./users.ts";

export const ReportTypes = {
	FAILURE: "FAILURE",
	MAINTENANCE: "MAINTENANCE",
	OBSERVATION: "OBSERVATION",
	REQUEST: "REQUEST",
} as const;

export type ReportType = (typeof ReportTypes)[keyof typeof ReportTypes];

export const reportTypeEnum = pgEnum("report_type", [
	ReportTypes.FAILURE,
	ReportTypes.MAINTENANCE,
	ReportTypes.OBSERVATION,
	ReportTypes.REQUEST,
]);

export const ReportStatuses = {
	PENDING: "PENDING",
	IN_REVIEW: "IN_REVIEW",
	RESOLVED: "RESOLVED",
	CLOSED: "CLOSED",
} as const;

export type ReportStatus = (typeof ReportStatuses)[keyof typeof ReportStatuses];

export const reportStatusEnum = pgEnum("report_status", [
	ReportStatuses.PENDING,
	ReportStatuses.IN_REVIEW,
	ReportStatuses.RESOLVED,
	ReportStatuses.CLOSED,
]);

export const reports = pgTable(
	"reports",
	{
		id: serial("id").primaryKey(),

		// Relations
		articleId: integer("article_id")
			.notNull()
			.references(() => articles.id, { onDelete: "restrict" }),
		userId: integer("user_id")
			.notNull()
			.references(() => users.id, { onDelete: "restrict" }),

		// Content
		reportType: reportTypeEnum("report_type").notNull(),
		message: text("message").notNull(),
		status: reportStatusEnum("status").notNull().default(ReportStatuses.PENDING),
		adminResponse: text("admin_response"),

		// Timestamps
		createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
		updatedAt: timestamp("updated_at", { mode: "date" }),
	},
	(table) => ({
		articleIdIdx: index("idx_reports_article_id").on(table.articleId),
		userIdIdx: index("idx_reports_user_id").on(table.userId),
		statusIdx: index("idx_reports_status").on(table.status),
		createdAtIdx: index("idx_reports_created_at").on(table.createdAt),
	})
);

export type Report = typeof reports.$inferSelect;
export type NewReport = typeof reports.$inferInsert;
