import type { Article } from "../../db/index.ts";
import type {
	ArticleChanges,
	ArticleRepository,
	NewArticleData,
	SuggestionField,
} from "../articleRepository.ts";
import { DuplicateEntryError } from "../errors.ts";

export class MemoryArticleRepository implements ArticleRepository {
	private readonly articles = new Map<number, Article>();
	private nextId = 1;

	async list(): Promise<Article[]> {
		return [...this.articles.values()]
			.sort((a, b) => a.id - b.id)
			.map((article) => ({ ...article }));
	}

	async findById(id: number): Promise<Article | null> {
		const article = this.articles.get(id);
		return article ? { ...article } : null;
	}

	async findByCode(code: string): Promise<Article | null> {
		const article = [...this.articles.values()].find((a) => a.code === code);
		return article ? { ...article } : null;
	}

	async findByName(name: string): Promise<Article | null> {
		const needle = name.toLowerCase();
		const article = [...this.articles.values()].find(
			(a) => a.name.toLowerCase() === needle
		);
		return article ? { ...article } : null;
	}

	async create(data: NewArticleData): Promise<Article> {
		if ([...this.articles.values()].some((article) => article.code === data.code)) {
			throw new DuplicateEntryError("code", data.code);
		}

		const now = new Date();
		const article: Article = { ...data, id: this.nextId++, createdAt: now, updatedAt: now };
		this.articles.set(article.id, article);
		return { ...article };
	}

	async update(id: number, changes: ArticleChanges): Promise<Article | null> {
		const existing = this.articles.get(id);
		if (!existing) return null;

		const updated: Article = { ...existing, ...changes, updatedAt: new Date() };
		this.articles.set(id, updated);
		return { ...updated };
	}

	async delete(id: number): Promise<boolean> {
		return this.articles.delete(id);
	}

	async suggestions(
		field: SuggestionField,
		query: string,
		limit: number
	): Promise<string[]> {
		const needle = query.toLowerCase();
		const values = new Set<string>();
		for (const article of this.articles.values()) {
			const value = article[field];
			if (value && value.toLowerCase().includes(needle)) {
				values.add(value);
			}
		}
		return [...values].slice(0, limit);
	}

	async count(): Promise<number> {
		return this.articles.size;
	}
}
