import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import type { ArticleRepository } from "../../repositories/articleRepository.ts";
import type { ReportRepository } from "../../repositories/reportRepository.ts";
import { Service } from "../index.ts";

interface DeleteArticleData {
	id: number;
}

class DeleteArticleService extends Service<DeleteArticleData, void> {
	constructor(
		data: DeleteArticleData,
		private readonly articles: ArticleRepository,
		private readonly reports: ReportRepository
	) {
		super(data);
	}

	async handle(): Promise<void> {
		const article = await this.articles.findById(this.data.id);
		if (!article) {
			throw new HTTPError({
				httpStatus: StatusCodes.NOT_FOUND,
				message: ErrorMessages.ARTICLE_NOT_FOUND,
			});
		}

		const reportCount = await this.reports.countByArticle(article.id);
		if (reportCount > 0) {
			throw new HTTPError({
				httpStatus: StatusCodes.CONFLICT,
				message: `Article ${article.code} has ${reportCount} report(s) and cannot be deleted`,
			});
		}

		await this.articles.delete(article.id);
	}
}

export default DeleteArticleService;
