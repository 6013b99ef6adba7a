import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import type { Article } from "../../db/index.ts";
import type { ArticleChanges, ArticleRepository } from "../../repositories/articleRepository.ts";
import { Service } from "../index.ts";
import {
	normaliseLabel,
	normaliseName,
	normaliseText,
	normaliseUnit,
} from "./normalise.ts";
import type { UpdateArticleBody } from "./schemas.ts";

export { UpdateArticleBodySchema } from "./schemas.ts";

export interface UpdateArticleData {
	id: number;
	changes: UpdateArticleBody;
}

class UpdateArticleService extends Service<UpdateArticleData, Article> {
	constructor(
		data: UpdateArticleData,
		private readonly articles: ArticleRepository
	) {
		super(data);
	}

	async handle(): Promise<Article> {
		const { changes } = this.data;
		const normalised: ArticleChanges = {};

		// Only fields present in the body change
		if (changes.name !== undefined) normalised.name = normaliseName(changes.name);
		if (changes.description !== undefined)
			normalised.description = normaliseText(changes.description);
		if (changes.type !== undefined) normalised.type = normaliseText(changes.type);
		if (changes.category !== undefined)
			normalised.category = normaliseLabel(changes.category);
		if (changes.unit !== undefined) normalised.unit = normaliseUnit(changes.unit);
		if (changes.stockMin !== undefined) normalised.stockMin = changes.stockMin;
		if (changes.stockCurrent !== undefined) normalised.stockCurrent = changes.stockCurrent;
		if (changes.location !== undefined)
			normalised.location = normaliseLabel(changes.location);
		if (changes.status !== undefined) normalised.status = changes.status;
		if (changes.acquisitionDate !== undefined)
			normalised.acquisitionDate = changes.acquisitionDate;
		if (changes.observations !== undefined)
			normalised.observations = normaliseText(changes.observations);

		const article = await this.articles.update(this.data.id, normalised);
		if (!article) {
			throw new HTTPError({
				httpStatus: StatusCodes.NOT_FOUND,
				message: ErrorMessages.ARTICLE_NOT_FOUND,
			});
		}
		return article;
	}
}

export default UpdateArticleService;
