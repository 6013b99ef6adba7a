import { z } from "zod";

import { getIdValidationSchema, getMinMaxValidationSchema } from "../../config/zodSchemas.ts";
import { ReportStatuses, ReportTypes } from "../../db/index.ts";

export const reportTypeSchema = z.enum(
	[ReportTypes.FAILURE, ReportTypes.MAINTENANCE, ReportTypes.OBSERVATION, ReportTypes.REQUEST],
	{ required_error: "Report type is required" }
);

export const reportStatusSchema = z.enum([
	ReportStatuses.PENDING,
	ReportStatuses.IN_REVIEW,
	ReportStatuses.RESOLVED,
	ReportStatuses.CLOSED,
]);

export const CreateReportBodySchema = z.object({
	articleId: getIdValidationSchema("Article id"),
	reportType: reportTypeSchema,
	message: getMinMaxValidationSchema({ valueName: "Message", max: 2000 }),
});

export type CreateReportBody = z.infer<typeof CreateReportBodySchema>;

export const UpdateReportBodySchema = z.object({
	status: reportStatusSchema.optional(),
	adminResponse: z.string().trim().max(2000).optional(),
});

export type UpdateReportBody = z.infer<typeof UpdateReportBodySchema>;

export const ReportListQuerySchema = z.object({
	status: reportStatusSchema.optional(),
});
