import type { SecurityEvent, SecurityEventKind } from "../db/index.ts";

export interface NewSecurityEventData {
	identity: string;
	kind: SecurityEventKind;
	outcome: string;
	occurredAt: Date;
	ipAddress?: string | null;
	userAgent?: string | null;
	requestId?: string | null;
}

export interface SecurityEventFilters {
	identity?: string;
	kind?: SecurityEventKind;
	limit: number;
	offset: number;
}

export interface SecurityEventPage {
	events: SecurityEvent[];
	total: number;
}

/**
 * Append-only log of authentication outcomes
 */
export interface SecurityEventRepository {
	append(event: NewSecurityEventData): Promise<void>;
	/** Newest first */
	list(filters: SecurityEventFilters): Promise<SecurityEventPage>;
}
