import {
	index,
	pgEnum,
	pgTable,
	serial,
	text,
	timestamp,
	uniqueIndex,
} from "drizzle-orm/pg-core";

export const Roles = {
	ADMIN: "ADMIN",
	USER: "USER", // plant operator
} as const;

export type Role = (typeof Roles)[keyof typeof Roles];

export const rolesEnum = pgEnum("user_role", [Roles.ADMIN, Roles.USER]);

export const UserStatuses = {
	ACTIVE: "ACTIVE",
	DISABLED: "DISABLED",
} as const;

export type UserStatus = (typeof UserStatuses)[keyof typeof UserStatuses];

export const userStatusEnum = pgEnum("user_status", [
	UserStatuses.ACTIVE,
	UserStatuses.DISABLED,
]);

export const users = pgTable(
	"users",
	{
		id: serial("id").primaryKey(),

		// Identity
		username: text("username").notNull(),
		email: text("email").notNull(),
		fullName: text("full_name").notNull(),

		// Auth
		passwordHash: text("password_hash").notNull(),
		role: rolesEnum("role").notNull().default(Roles.USER),
		status: userStatusEnum("status").notNull().default(UserStatuses.ACTIVE),

		// Timestamps
		createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
		updatedAt: timestamp("updated_at", { mode: "date" }).defaultNow().notNull(),
		lastLoginAt: timestamp("last_login_at", { mode: "date" }),
	},
	(table) => ({
		usernameIdx: uniqueIndex("idx_users_username").on(table.username),
		emailIdx: uniqueIndex("idx_users_email").on(table.email),
		roleIdx: index("idx_users_role").on(table.role),
		statusIdx: index("idx_users_status").on(table.status),
	})
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
