import {
	index,
	pgEnum,
	pgTable,
	serial,
	text,
	timestamp,
} from "drizzle-orm/pg-core";

export const SecurityEventKinds = {
	LOGIN_SUCCESS: "LOGIN_SUCCESS",
	LOGIN_FAILED: "LOGIN_FAILED",
	LOGIN_BLOCKED: "LOGIN_BLOCKED",
} as const;

export type SecurityEventKind =
	(typeof SecurityEventKinds)[keyof typeof SecurityEventKinds];

export const securityEventKindEnum = pgEnum("security_event_kind", [
	SecurityEventKinds.LOGIN_SUCCESS,
	SecurityEventKinds.LOGIN_FAILED,
	SecurityEventKinds.LOGIN_BLOCKED,
]);

export const securityEvents = pgTable(
	"security_events",
	{
		id: serial("id").primaryKey(),

		// Who (attempted identity, may not exist)
		identity: text("identity").notNull(),

		// What
		kind: securityEventKindEnum("kind").notNull(),
		outcome: text("outcome").notNull(),

		// Context
		ipAddress: text("ip_address"),
		userAgent: text("user_agent"),
		requestId: text("request_id"),

		// Append-only: no updated/deleted columns
		occurredAt: timestamp("occurred_at", { mode: "date" }).defaultNow().notNull(),
	},
	(table) => ({
		identityIdx: index("idx_security_events_identity").on(table.identity),
		kindIdx: index("idx_security_events_kind").on(table.kind),
		occurredAtIdx: index("idx_security_events_occurred_at").on(table.occurredAt),
	})
);

export type SecurityEvent = typeof securityEvents.$inferSelect;
export type NewSecurityEvent = typeof securityEvents.$inferInsert;
