import {
	date,
	index,
	integer,
	pgTable,
	serial,
	text,
	timestamp,
	uniqueIndex,
} from "drizzle-orm/pg-core";

export const DEFAULT_ARTICLE_UNIT = "unit";
export const DEFAULT_ARTICLE_STATUS = "OPERATIONAL";

export const articles = pgTable(
	"articles",
	{
		id: serial("id").primaryKey(),

		// Identification
		code: text("code").notNull(),
		name: text("name").notNull(),
		description: text("description"),
		type: text("type"),
		category: text("category"),

		// Stock
		unit: text("unit").notNull().default(DEFAULT_ARTICLE_UNIT),
		stockMin: integer("stock_min").notNull().default(0),
		stockCurrent: integer("stock_current").notNull().default(0),

		// Placement & condition
		location: text("location"),
		status: text("status").notNull().default(DEFAULT_ARTICLE_STATUS),
		acquisitionDate: date("acquisition_date", { mode: "string" }),
		observations: text("observations"),

		// Timestamps
		createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
		updatedAt: timestamp("updated_at", { mode: "date" }).defaultNow().notNull(),
	},
	(table) => ({
		codeIdx: uniqueIndex("idx_articles_code").on(table.code),
		categoryIdx: index("idx_articles_category").on(table.category),
		statusIdx: index("idx_articles_status").on(table.status),
		locationIdx: index("idx_articles_location").on(table.location),
		typeIdx: index("idx_articles_type").on(table.type),
		createdAtIdx: index("idx_articles_created_at").on(table.createdAt),
	})
);

export type Article = typeof articles.$inferSelect;
export type NewArticle = typeof articles.$inferInsert;
