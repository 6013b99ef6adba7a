import { beforeEach, describe, expect, it } from "vitest";

import { ReportStatuses, ReportTypes } from "../../src/db/index.ts";
import type { Article, User } from "../../src/db/index.ts";
import { createMemoryRepositories } from "../../src/repositories/index.ts";
import type { Repositories } from "../../src/repositories/index.ts";
import CreateReportService from "../../src/services/reports/createReport.ts";
import UpdateReportService from "../../src/services/reports/updateReport.ts";

const REVIEWED_AT = new Date("2026-03-02T10:30:00.000Z");

describe("report services", () => {
	let repositories: Repositories;
	let article: Article;
	let operator: User;

	beforeEach(async () => {
		repositories = createMemoryRepositories();
		article = await repositories.articles.create({
			code: "PMP-001",
			name: "Centrifugal Pump",
			description: null,
			type: "Machinery",
			category: null,
			unit: "unit",
			stockMin: 0,
			stockCurrent: 1,
			location: null,
			status: "OPERATIONAL",
			acquisitionDate: null,
			observations: null,
		});
		operator = await repositories.users.create({
			username: "operario1",
			email: "operario1@plant.example",
			fullName: "Operario Uno",
			passwordHash: "not-a-digest",
		});
	});

	const createReport = (articleId: number) =>
		new CreateReportService(
			{
				articleId,
				userId: operator.id,
				reportType: ReportTypes.FAILURE,
				message: "Seal leaking",
			},
			repositories.reports,
			repositories.articles
		).execute();

	describe("CreateReportService", () => {
		it("files a pending report", async () => {
			const report = await createReport(article.id);

			expect(report).toMatchObject({
				id: 1,
				articleId: article.id,
				userId: operator.id,
				reportType: ReportTypes.FAILURE,
				message: "Seal leaking",
				status: ReportStatuses.PENDING,
				adminResponse: null,
				updatedAt: null,
			});
		});

		it("answers 404 for an unknown article", async () => {
			const attempt = createReport(99);

			await expect(attempt).rejects.toThrow("Article not found.");
			await expect(attempt).rejects.toHaveProperty("httpStatus", 404);
		});
	});

	describe("UpdateReportService", () => {
		it("records the review and its time", async () => {
			const report = await createReport(article.id);

			const updated = await new UpdateReportService(
				{
					id: report.id,
					changes: { status: ReportStatuses.RESOLVED, adminResponse: "Seal replaced" },
				},
				repositories.reports,
				() => REVIEWED_AT
			).execute();

			expect(updated).toMatchObject({
				status: ReportStatuses.RESOLVED,
				adminResponse: "Seal replaced",
				updatedAt: REVIEWED_AT,
			});
		});

		it("keeps fields that are not provided", async () => {
			const report = await createReport(article.id);

			const updated = await new UpdateReportService(
				{ id: report.id, changes: { status: ReportStatuses.IN_REVIEW } },
				repositories.reports,
				() => REVIEWED_AT
			).execute();

			expect(updated.status).toBe(ReportStatuses.IN_REVIEW);
			expect(updated.adminResponse).toBeNull();
		});

		it("rejects an empty change set", async () => {
			const report = await createReport(article.id);

			const attempt = new UpdateReportService(
				{ id: report.id, changes: {} },
				repositories.reports
			).execute();

			await expect(attempt).rejects.toThrow("Provide a status or an admin response");
			await expect(attempt).rejects.toHaveProperty("httpStatus", 422);
		});

		it("answers 404 for an unknown report", async () => {
			const attempt = new UpdateReportService(
				{ id: 99, changes: { status: ReportStatuses.CLOSED } },
				repositories.reports
			).execute();

			await expect(attempt).rejects.toThrow("Report not found.");
		});
	});

	describe("listing", () => {
		it("attaches the article and author and filters by status", async () => {
			const first = await createReport(article.id);
			await createReport(article.id);
			await repositories.reports.update(first.id, { status: ReportStatuses.CLOSED });

			const closed = await repositories.reports.list({ status: ReportStatuses.CLOSED });

			expect(closed).toHaveLength(1);
			expect(closed[0]).toMatchObject({
				id: first.id,
				article: { id: article.id, code: "PMP-001", name: "Centrifugal Pump" },
				user: { id: operator.id, username: "operario1", fullName: "Operario Uno" },
			});
			expect(await repositories.reports.list({ userId: operator.id })).toHaveLength(2);
			expect(await repositories.reports.countByArticle(article.id)).toBe(2);
		});
	});
});
