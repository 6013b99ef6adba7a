import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import type { Report } from "../../db/index.ts";
import type { ArticleRepository } from "../../repositories/articleRepository.ts";
import type { ReportRepository } from "../../repositories/reportRepository.ts";
import { Service } from "../index.ts";
import type { CreateReportBody } from "./schemas.ts";

export { CreateReportBodySchema } from "./schemas.ts";

export interface CreateReportData extends CreateReportBody {
	userId: number;
}

class CreateReportService extends Service<CreateReportData, Report> {
	constructor(
		data: CreateReportData,
		private readonly reports: ReportRepository,
		private readonly articles: ArticleRepository
	) {
		super(data);
	}

	async handle(): Promise<Report> {
		const article = await this.articles.findById(this.data.articleId);
		if (!article) {
			throw new HTTPError({
				httpStatus: StatusCodes.NOT_FOUND,
				message: ErrorMessages.ARTICLE_NOT_FOUND,
			});
		}

		return this.reports.create({
			articleId: article.id,
			userId: this.data.userId,
			reportType: this.data.reportType,
			message: this.data.message,
		});
	}
}

export default CreateReportService;
