/**
 * Report Routes
 * Operators raise reports on equipment, the administrator triages them
 */

import { Router } from "express";
import { StatusCodes } from "http-status-codes";
import { z } from "zod";

import { AccessPolicies } from "../config/accessPolicies.ts";
import { HTTPError } from "../config/error.ts";
import ErrorMessages from "../config/errorMessages.ts";
import { idParamsSchema } from "../config/zodSchemas.ts";
import type { AuthGuard } from "../middleware/authMiddleware.ts";
import type { ArticleRepository } from "../repositories/articleRepository.ts";
import type { ReportRepository } from "../repositories/reportRepository.ts";
import type { UserRepository } from "../repositories/userRepository.ts";
import CreateReportService, { CreateReportBodySchema } from "../services/reports/createReport.ts";
import { ReportListQuerySchema } from "../services/reports/schemas.ts";
import UpdateReportService, { UpdateReportBodySchema } from "../services/reports/updateReport.ts";
import expressAsyncHandler, { expressValidatedHandler } from "../utils/expressAsyncHandler.ts";
import { getCurrentUser } from "./currentUser.ts";

const UpdateReportRequestSchema = z.object({
	params: idParamsSchema,
	body: UpdateReportBodySchema,
});

interface ReportRouterDependencies {
	reports: ReportRepository;
	articles: ArticleRepository;
	users: UserRepository;
	requireAuth: AuthGuard;
}

export function createReportRouter({
	reports,
	articles,
	users,
	requireAuth,
}: ReportRouterDependencies) {
	const router = Router();
	const ownReports = requireAuth(AccessPolicies.REPORTS_OWN);
	const manageReports = requireAuth(AccessPolicies.REPORTS_MANAGE);

	// ============================================
	// Operators
	// ============================================

	router.get(
		"/my-reports",
		ownReports,
		expressAsyncHandler(async (req, res) => {
			const user = await getCurrentUser(users, req);
			const list = await reports.list({ userId: user.id });
			return res.status(StatusCodes.OK).json(list);
		})
	);

	router.post(
		"/",
		ownReports,
		expressValidatedHandler(
			async (validatedData, req, res) => {
				const user = await getCurrentUser(users, req);
				const report = await new CreateReportService(
					{ ...validatedData, userId: user.id },
					reports,
					articles
				).execute();
				return res.status(StatusCodes.CREATED).json(report);
			},
			{
				validationSchema: CreateReportBodySchema,
				getValue: (req) => req.body,
			}
		)
	);

	// ============================================
	// Administrator
	// ============================================

	router.get(
		"/all",
		manageReports,
		expressValidatedHandler(
			async ({ status }, _req, res) => {
				const list = await reports.list({ status });
				return res.status(StatusCodes.OK).json(list);
			},
			{
				validationSchema: ReportListQuerySchema,
				getValue: (req) => req.query,
			}
		)
	);

	router.put(
		"/:id",
		manageReports,
		expressValidatedHandler(
			async ({ params, body }, _req, res) => {
				const report = await new UpdateReportService(
					{ id: params.id, changes: body },
					reports
				).execute();
				return res.status(StatusCodes.OK).json(report);
			},
			{
				validationSchema: UpdateReportRequestSchema,
				getValue: (req) => ({ params: req.params, body: req.body }),
			}
		)
	);

	router.delete(
		"/:id",
		manageReports,
		expressValidatedHandler(
			async ({ id }, _req, res) => {
				const deleted = await reports.delete(id);
				if (!deleted) {
					throw new HTTPError({
						httpStatus: StatusCodes.NOT_FOUND,
						message: ErrorMessages.REPORT_NOT_FOUND,
					});
				}
				return res.status(StatusCodes.OK).json({ message: "Report deleted" });
			},
			{
				validationSchema: idParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	return router;
}
