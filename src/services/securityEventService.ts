import { SecurityEventKinds } from "../db/index.ts";
import type { SecurityEventKind } from "../db/index.ts";
import type {
	SecurityEventFilters,
	SecurityEventPage,
	SecurityEventRepository,
} from "../repositories/securityEventRepository.ts";
import type { Clock } from "../utils/clock.ts";
import { systemClock } from "../utils/clock.ts";
import { logger } from "../utils/logger.ts";
import type { Logger } from "../utils/logger.ts";

/**
 * Request metadata attached to security events
 */
export interface SecurityEventContext {
	ipAddress?: string;
	userAgent?: string;
	requestId?: string;
}

export interface SecurityEventEntry {
	identity: string;
	kind: SecurityEventKind;
	outcome: string;
}

export class SecurityEventService {
	private readonly log: Logger;

	constructor(
		private readonly repository: SecurityEventRepository,
		private readonly clock: Clock = systemClock,
		log: Logger = logger
	) {
		this.log = log.child({ component: "security" });
	}

	/**
	 * Log and persist an authentication outcome.
	 * Persistence failures are logged and never reach the caller.
	 */
	async record(entry: SecurityEventEntry, context: SecurityEventContext = {}): Promise<void> {
		const event = {
			...entry,
			occurredAt: this.clock(),
			ipAddress: context.ipAddress ?? null,
			userAgent: context.userAgent ?? null,
			requestId: context.requestId ?? null,
		};

		const logContext = {
			identity: event.identity,
			kind: event.kind,
			outcome: event.outcome,
			ipAddress: event.ipAddress,
			requestId: event.requestId,
		};
		if (entry.kind === SecurityEventKinds.LOGIN_SUCCESS) {
			this.log.info("Security event", logContext);
		} else {
			this.log.warn("Security event", logContext);
		}

		try {
			await this.repository.append(event);
		} catch (error) {
			this.log.error("Failed to persist security event", error, logContext);
		}
	}

	async list(filters: SecurityEventFilters): Promise<SecurityEventPage> {
		return this.repository.list(filters);
	}
}
