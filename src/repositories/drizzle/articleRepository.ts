import { count, eq, ilike, sql } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";

import type { Database } from "../../config/database.ts";
import { articles } from "../../db/index.ts";
import type { Article } from "../../db/index.ts";
import type {
	ArticleChanges,
	ArticleRepository,
	NewArticleData,
	SuggestionField,
} from "../articleRepository.ts";
import { withUniqueGuard } from "./uniqueViolation.ts";

const SUGGESTION_COLUMNS: Record<SuggestionField, AnyPgColumn> = {
	name: articles.name,
	category: articles.category,
	location: articles.location,
	unit: articles.unit,
};

export class DrizzleArticleRepository implements ArticleRepository {
	constructor(private readonly db: Database) {}

	async list(): Promise<Article[]> {
		return this.db.select().from(articles).orderBy(articles.id);
	}

	async findById(id: number): Promise<Article | null> {
		const [article] = await this.db
			.select()
			.from(articles)
			.where(eq(articles.id, id))
			.limit(1);
		return article ?? null;
	}

	async findByCode(code: string): Promise<Article | null> {
		const [article] = await this.db
			.select()
			.from(articles)
			.where(eq(articles.code, code))
			.limit(1);
		return article ?? null;
	}

	async findByName(name: string): Promise<Article | null> {
		const [article] = await this.db
			.select()
			.from(articles)
			.where(sql`lower(${articles.name}) = lower(${name})`)
			.limit(1);
		return article ?? null;
	}

	async create(data: NewArticleData): Promise<Article> {
		const [article] = await withUniqueGuard({ code: data.code }, () =>
			this.db.insert(articles).values(data).returning()
		);
		return article;
	}

	async update(id: number, changes: ArticleChanges): Promise<Article | null> {
		const [article] = await this.db
			.update(articles)
			.set({ ...changes, updatedAt: new Date() })
			.where(eq(articles.id, id))
			.returning();
		return article ?? null;
	}

	async delete(id: number): Promise<boolean> {
		const deleted = await this.db
			.delete(articles)
			.where(eq(articles.id, id))
			.returning({ id: articles.id });
		return deleted.length > 0;
	}

	async suggestions(
		field: SuggestionField,
		query: string,
		limit: number
	): Promise<string[]> {
		const column = SUGGESTION_COLUMNS[field];
		const rows = await this.db
			.selectDistinct({ value: sql<string | null>`${column}` })
			.from(articles)
			.where(ilike(column, `%${query}%`))
			.limit(limit);
		return rows.flatMap((row) => (row.value ? [row.value] : []));
	}

	async count(): Promise<number> {
		const [row] = await this.db.select({ value: count() }).from(articles);
		return row?.value ?? 0;
	}
}
