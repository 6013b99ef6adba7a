import { beforeEach, describe, expect, it, vi } from "vitest";

import { SecurityEventKinds } from "../../src/db/index.ts";
import { MemorySecurityEventRepository } from "../../src/repositories/memory/securityEventRepository.ts";
import { SecurityEventService } from "../../src/services/securityEventService.ts";
import type { Logger } from "../../src/utils/logger.ts";

const START = new Date("2026-03-02T08:00:00.000Z");

const createLogger = () => {
	const log = {
		debug: vi.fn<Logger["debug"]>(),
		info: vi.fn<Logger["info"]>(),
		warn: vi.fn<Logger["warn"]>(),
		error: vi.fn<Logger["error"]>(),
		child: vi.fn<Logger["child"]>(),
	};
	log.child.mockReturnValue(log);
	return log;
};

describe("SecurityEventService", () => {
	let now: Date;
	let repository: MemorySecurityEventRepository;
	let log: ReturnType<typeof createLogger>;
	let service: SecurityEventService;

	beforeEach(() => {
		now = START;
		repository = new MemorySecurityEventRepository();
		log = createLogger();
		service = new SecurityEventService(repository, () => now, log);
	});

	it("tags its log lines with the security component", () => {
		expect(log.child).toHaveBeenCalledWith({ component: "security" });
	});

	it("persists the event with its request context", async () => {
		await service.record(
			{ identity: "operario1", kind: SecurityEventKinds.LOGIN_SUCCESS, outcome: "SUCCESS" },
			{ ipAddress: "10.0.0.7", userAgent: "vitest", requestId: "req-1" }
		);

		const page = await service.list({ limit: 10, offset: 0 });
		expect(page).toEqual({
			total: 1,
			events: [
				{
					id: 1,
					identity: "operario1",
					kind: SecurityEventKinds.LOGIN_SUCCESS,
					outcome: "SUCCESS",
					occurredAt: START,
					ipAddress: "10.0.0.7",
					userAgent: "vitest",
					requestId: "req-1",
				},
			],
		});
	});

	it("logs successes as info and other outcomes as warnings", async () => {
		await service.record({
			identity: "operario1",
			kind: SecurityEventKinds.LOGIN_SUCCESS,
			outcome: "SUCCESS",
		});
		await service.record(
			{
				identity: "operario1",
				kind: SecurityEventKinds.LOGIN_FAILED,
				outcome: "INVALID_CREDENTIALS",
			},
			{ ipAddress: "10.0.0.7", requestId: "req-2" }
		);

		expect(log.info).toHaveBeenCalledWith("Security event", {
			identity: "operario1",
			kind: SecurityEventKinds.LOGIN_SUCCESS,
			outcome: "SUCCESS",
			ipAddress: null,
			requestId: null,
		});
		expect(log.warn).toHaveBeenCalledWith("Security event", {
			identity: "operario1",
			kind: SecurityEventKinds.LOGIN_FAILED,
			outcome: "INVALID_CREDENTIALS",
			ipAddress: "10.0.0.7",
			requestId: "req-2",
		});
	});

	it("logs a failed write instead of throwing", async () => {
		const failure = new Error("disk full");
		vi.spyOn(repository, "append").mockRejectedValue(failure);

		await expect(
			service.record({
				identity: "operario1",
				kind: SecurityEventKinds.LOGIN_BLOCKED,
				outcome: "ACCOUNT_LOCKED",
			})
		).resolves.toBeUndefined();

		expect(log.error).toHaveBeenCalledWith("Failed to persist security event", failure, {
			identity: "operario1",
			kind: SecurityEventKinds.LOGIN_BLOCKED,
			outcome: "ACCOUNT_LOCKED",
			ipAddress: null,
			requestId: null,
		});
	});

	it("pages newest first and filters by identity and kind", async () => {
		for (const [offsetMs, identity, kind] of [
			[0, "operario1", SecurityEventKinds.LOGIN_FAILED],
			[1000, "operario2", SecurityEventKinds.LOGIN_FAILED],
			[2000, "operario1", SecurityEventKinds.LOGIN_SUCCESS],
			[3000, "operario1", SecurityEventKinds.LOGIN_FAILED],
		] as const) {
			now = new Date(START.getTime() + offsetMs);
			await service.record({ identity, kind, outcome: kind });
		}

		const page = await service.list({ identity: "operario1", limit: 2, offset: 1 });
		expect(page.total).toBe(3);
		expect(page.events.map((event) => event.id)).toEqual([3, 1]);

		const failures = await service.list({
			kind: SecurityEventKinds.LOGIN_FAILED,
			limit: 10,
			offset: 0,
		});
		expect(failures.events.map((event) => event.id)).toEqual([4, 2, 1]);
	});
});
