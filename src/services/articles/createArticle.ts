import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import { DEFAULT_ARTICLE_STATUS } from "../../db/index.ts";
import type { Article } from "../../db/index.ts";
import type { ArticleRepository } from "../../repositories/articleRepository.ts";
import { DuplicateEntryError } from "../../repositories/errors.ts";
import { Service } from "../index.ts";
import {
	isTool,
	normaliseCode,
	normaliseLabel,
	normaliseName,
	normaliseText,
	normaliseUnit,
} from "./normalise.ts";
import type { CreateArticleData } from "./schemas.ts";

export { CreateArticleDataSchema } from "./schemas.ts";

const codeTaken = (code: string) =>
	new HTTPError({
		httpStatus: StatusCodes.CONFLICT,
		message: `Article code ${code} already exists`,
	});

class CreateArticleService extends Service<CreateArticleData, Article> {
	constructor(
		data: CreateArticleData,
		private readonly articles: ArticleRepository
	) {
		super(data);
	}

	async handle(): Promise<Article> {
		const code = normaliseCode(this.data.code);
		if (await this.articles.findByCode(code)) {
			throw codeTaken(code);
		}

		const name = normaliseName(this.data.name);
		const type = normaliseText(this.data.type);
		if (isTool(type)) {
			const existing = await this.articles.findByName(name);
			if (existing) {
				throw new HTTPError({
					httpStatus: StatusCodes.CONFLICT,
					message: `A similar tool already exists: ${existing.name} (code: ${existing.code})`,
				});
			}
		}

		try {
			return await this.articles.create({
				code,
				name,
				description: normaliseText(this.data.description),
				type,
				category: normaliseLabel(this.data.category),
				unit: normaliseUnit(this.data.unit),
				stockMin: this.data.stockMin,
				stockCurrent: this.data.stockCurrent,
				location: normaliseLabel(this.data.location),
				status: this.data.status ?? DEFAULT_ARTICLE_STATUS,
				acquisitionDate: this.data.acquisitionDate ?? null,
				observations: normaliseText(this.data.observations),
			});
		} catch (error) {
			if (error instanceof DuplicateEntryError) {
				throw codeTaken(error.value);
			}
			throw error;
		}
	}
}

export default CreateArticleService;
