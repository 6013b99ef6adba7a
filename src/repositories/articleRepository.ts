import type { Article } from "../db/index.ts";

export const SuggestionFields = ["name", "category", "location", "unit"] as const;

export type SuggestionField = (typeof SuggestionFields)[number];

export type NewArticleData = Omit<Article, "id" | "createdAt" | "updatedAt">;

export type ArticleChanges = Partial<NewArticleData>;

export interface ArticleRepository {
	list(): Promise<Article[]>;
	findById(id: number): Promise<Article | null>;
	findByCode(code: string): Promise<Article | null>;
	/** Case-insensitive exact name match */
	findByName(name: string): Promise<Article | null>;
	create(data: NewArticleData): Promise<Article>;
	update(id: number, changes: ArticleChanges): Promise<Article | null>;
	delete(id: number): Promise<boolean>;
	/** Distinct non-empty values of `field` containing `query`, case-insensitive */
	suggestions(field: SuggestionField, query: string, limit: number): Promise<string[]>;
	count(): Promise<number>;
}
