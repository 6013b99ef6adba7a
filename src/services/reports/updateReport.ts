import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import type { Report } from "../../db/index.ts";
import type { ReportChanges, ReportRepository } from "../../repositories/reportRepository.ts";
import type { Clock } from "../../utils/clock.ts";
import { systemClock } from "../../utils/clock.ts";
import { Service } from "../index.ts";
import type { UpdateReportBody } from "./schemas.ts";

export { UpdateReportBodySchema } from "./schemas.ts";

export interface UpdateReportData {
	id: number;
	changes: UpdateReportBody;
}

class UpdateReportService extends Service<UpdateReportData, Report> {
	constructor(
		data: UpdateReportData,
		private readonly reports: ReportRepository,
		private readonly clock: Clock = systemClock
	) {
		super(data);
	}

	async validate(): Promise<string | undefined> {
		const { status, adminResponse } = this.data.changes;
		if (status === undefined && adminResponse === undefined) {
			return "Provide a status or an admin response";
		}
		return undefined;
	}

	async handle(): Promise<Report> {
		const { status, adminResponse } = this.data.changes;
		const changes: ReportChanges = { updatedAt: this.clock() };
		if (status !== undefined) changes.status = status;
		if (adminResponse !== undefined) changes.adminResponse = adminResponse;

		const report = await this.reports.update(this.data.id, changes);
		if (!report) {
			throw new HTTPError({
				httpStatus: StatusCodes.NOT_FOUND,
				message: ErrorMessages.REPORT_NOT_FOUND,
			});
		}
		return report;
	}
}

export default UpdateReportService;
