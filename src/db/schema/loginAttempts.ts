import {
	index,
	integer,
	pgTable,
	serial,
	text,
	timestamp,
	uniqueIndex,
} from "drizzle-orm/pg-core";

/**
 * Login Attempts Table
 * Per-identity failed login counter and lockout window
 */
export const loginAttempts = pgTable(
	"login_attempts",
	{
		id: serial("id").primaryKey(),

		// Normalised username; rows exist for unknown usernames too
		identifier: text("identifier").notNull(),

		// Attempt tracking
		attempts: integer("attempts").notNull().default(0),
		lockedUntil: timestamp("locked_until", { mode: "date" }),

		// Timestamps
		lastAttemptAt: timestamp("last_attempt_at", { mode: "date" }).defaultNow().notNull(),
		createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
	},
	(table) => ({
		identifierIdx: uniqueIndex("idx_login_attempts_identifier").on(table.identifier),
		lockedUntilIdx: index("idx_login_attempts_locked_until").on(table.lockedUntil),
	})
);

export type LoginAttempt = typeof loginAttempts.$inferSelect;
export type NewLoginAttempt = typeof loginAttempts.$inferInsert;
