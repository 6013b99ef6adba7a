/**
 * Article Routes
 * Equipment inventory: operators read, the administrator writes
 */

import { Router } from "express";
import { StatusCodes } from "http-status-codes";
import { z } from "zod";

import { AccessPolicies } from "../config/accessPolicies.ts";
import { HTTPError } from "../config/error.ts";
import ErrorMessages from "../config/errorMessages.ts";
import { getStringValidationSchema, idParamsSchema } from "../config/zodSchemas.ts";
import type { AuthGuard } from "../middleware/authMiddleware.ts";
import { SuggestionFields } from "../repositories/articleRepository.ts";
import type { ArticleRepository } from "../repositories/articleRepository.ts";
import type { ReportRepository } from "../repositories/reportRepository.ts";
import CreateArticleService, { CreateArticleDataSchema } from "../services/articles/createArticle.ts";
import DeleteArticleService from "../services/articles/deleteArticle.ts";
import { normaliseCode } from "../services/articles/normalise.ts";
import UpdateArticleService, { UpdateArticleBodySchema } from "../services/articles/updateArticle.ts";
import expressAsyncHandler, { expressValidatedHandler } from "../utils/expressAsyncHandler.ts";

const SUGGESTION_LIMIT = 10;
const SUGGESTION_MIN_QUERY_LENGTH = 2;

const SuggestionQuerySchema = z.object({
	field: z.enum(SuggestionFields, { message: "Field must be one of name, category, location, unit" }).default("name"),
	query: z.string().trim().default(""),
});

const CheckCodeParamsSchema = z.object({
	code: getStringValidationSchema("Code"),
});

const UpdateArticleRequestSchema = z.object({
	params: idParamsSchema,
	body: UpdateArticleBodySchema,
});

interface ArticleRouterDependencies {
	articles: ArticleRepository;
	reports: ReportRepository;
	requireAuth: AuthGuard;
}

export function createArticleRouter({ articles, reports, requireAuth }: ArticleRouterDependencies) {
	const router = Router();
	const canRead = requireAuth(AccessPolicies.ARTICLES_READ);
	const canWrite = requireAuth(AccessPolicies.ARTICLES_WRITE);

	/**
	 * GET /articles/suggestions?field=name&query=comp
	 * Distinct values for autocompletion
	 */
	router.get(
		"/suggestions",
		canRead,
		expressValidatedHandler(
			async ({ field, query }, _req, res) => {
				if (query.length < SUGGESTION_MIN_QUERY_LENGTH) {
					return res.status(StatusCodes.OK).json([]);
				}
				const suggestions = await articles.suggestions(field, query, SUGGESTION_LIMIT);
				return res.status(StatusCodes.OK).json(suggestions);
			},
			{
				validationSchema: SuggestionQuerySchema,
				getValue: (req) => req.query,
			}
		)
	);

	/**
	 * GET /articles/check-code/:code
	 */
	router.get(
		"/check-code/:code",
		canRead,
		expressValidatedHandler(
			async ({ code }, _req, res) => {
				const existing = await articles.findByCode(normaliseCode(code));
				return res.status(StatusCodes.OK).json({ exists: existing !== null });
			},
			{
				validationSchema: CheckCodeParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	router.get(
		"/",
		canRead,
		expressAsyncHandler(async (_req, res) => {
			const list = await articles.list();
			return res.status(StatusCodes.OK).json(list);
		})
	);

	router.get(
		"/:id",
		canRead,
		expressValidatedHandler(
			async ({ id }, _req, res) => {
				const article = await articles.findById(id);
				if (!article) {
					throw new HTTPError({
						httpStatus: StatusCodes.NOT_FOUND,
						message: ErrorMessages.ARTICLE_NOT_FOUND,
					});
				}
				return res.status(StatusCodes.OK).json(article);
			},
			{
				validationSchema: idParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	router.post(
		"/",
		canWrite,
		expressValidatedHandler(
			async (validatedData, _req, res) => {
				const article = await new CreateArticleService(validatedData, articles).execute();
				return res.status(StatusCodes.CREATED).json(article);
			},
			{
				validationSchema: CreateArticleDataSchema,
				getValue: (req) => req.body,
			}
		)
	);

	router.put(
		"/:id",
		canWrite,
		expressValidatedHandler(
			async ({ params, body }, _req, res) => {
				const article = await new UpdateArticleService(
					{ id: params.id, changes: body },
					articles
				).execute();
				return res.status(StatusCodes.OK).json(article);
			},
			{
				validationSchema: UpdateArticleRequestSchema,
				getValue: (req) => ({ params: req.params, body: req.body }),
			}
		)
	);

	router.delete(
		"/:id",
		canWrite,
		expressValidatedHandler(
			async ({ id }, _req, res) => {
				await new DeleteArticleService({ id }, articles, reports).execute();
				return res.status(StatusCodes.OK).json({ message: "Article deleted" });
			},
			{
				validationSchema: idParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	return router;
}
