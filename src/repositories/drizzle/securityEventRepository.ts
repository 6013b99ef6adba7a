import { and, count, desc, eq } from "drizzle-orm";
import type { SQL } from "drizzle-orm";

import type { Database } from "../../config/database.ts";
import { securityEvents } from "../../db/index.ts";
import type {
	NewSecurityEventData,
	SecurityEventFilters,
	SecurityEventPage,
	SecurityEventRepository,
} from "../securityEventRepository.ts";

export class DrizzleSecurityEventRepository implements SecurityEventRepository {
	constructor(private readonly db: Database) {}

	async append(event: NewSecurityEventData): Promise<void> {
		await this.db.insert(securityEvents).values({
			identity: event.identity,
			kind: event.kind,
			outcome: event.outcome,
			occurredAt: event.occurredAt,
			ipAddress: event.ipAddress ?? null,
			userAgent: event.userAgent ?? null,
			requestId: event.requestId ?? null,
		});
	}

	async list({
		identity,
		kind,
		limit,
		offset,
	}: SecurityEventFilters): Promise<SecurityEventPage> {
		const conditions: SQL[] = [];
		if (identity) conditions.push(eq(securityEvents.identity, identity));
		if (kind) conditions.push(eq(securityEvents.kind, kind));
		const where = and(...conditions);

		const [events, [totalRow]] = await Promise.all([
			this.db
				.select()
				.from(securityEvents)
				.where(where)
				.orderBy(desc(securityEvents.occurredAt), desc(securityEvents.id))
				.limit(limit)
				.offset(offset),
			this.db.select({ value: count() }).from(securityEvents).where(where),
		]);

		return { events, total: totalRow?.value ?? 0 };
	}
}
