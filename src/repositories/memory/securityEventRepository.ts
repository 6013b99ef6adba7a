import type { SecurityEvent } from "../../db/index.ts";
import type {
	NewSecurityEventData,
	SecurityEventFilters,
	SecurityEventPage,
	SecurityEventRepository,
} from "../securityEventRepository.ts";

export class MemorySecurityEventRepository implements SecurityEventRepository {
	private readonly events: SecurityEvent[] = [];

	async append(event: NewSecurityEventData): Promise<void> {
		this.events.push({
			id: this.events.length + 1,
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
		const matching = this.events
			.filter((event) => !identity || event.identity === identity)
			.filter((event) => !kind || event.kind === kind)
			.sort(
				(a, b) => b.occurredAt.getTime() - a.occurredAt.getTime() || b.id - a.id
			);

		return {
			events: matching.slice(offset, offset + limit).map((event) => ({ ...event })),
			total: matching.length,
		};
	}
}
