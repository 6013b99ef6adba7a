import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger, formatLine, setLogLevel } from "../../src/utils/logger.ts";

const AT = new Date("2026-03-02T08:00:00.000Z");

describe("logger", () => {
	beforeEach(() => {
		vi.useFakeTimers({ toFake: ["Date"] });
		vi.setSystemTime(AT);
		setLogLevel("debug");
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
		setLogLevel("info");
	});

	it("formats a line with its context", () => {
		expect(formatLine("info", "Server started", { port: 3000 }, AT)).toBe(
			'[2026-03-02T08:00:00.000Z] INFO  Server started {"port":3000}'
		);
	});

	it("omits an empty context", () => {
		expect(formatLine("error", "Shutting down", {}, AT)).toBe(
			"[2026-03-02T08:00:00.000Z] ERROR Shutting down"
		);
	});

	it("merges the context of nested children into each line", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

		createLogger({ component: "server" })
			.child({ requestId: "req-1" })
			.warn("Slow request", { ms: 1200 });

		expect(warn).toHaveBeenCalledOnce();
		expect(warn).toHaveBeenCalledWith(
			'[2026-03-02T08:00:00.000Z] WARN  Slow request {"component":"server","requestId":"req-1","ms":1200}'
		);
	});

	it("lets the call context override the child context", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		createLogger({ component: "server" }).info("Moved", { component: "worker" });

		expect(log).toHaveBeenCalledWith(
			'[2026-03-02T08:00:00.000Z] INFO  Moved {"component":"worker"}'
		);
	});

	it("drops records below the configured level", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		setLogLevel("warn");

		const logger = createLogger();
		logger.debug("hidden");
		logger.info("hidden");
		logger.warn("shown");

		expect(log).not.toHaveBeenCalled();
		expect(warn).toHaveBeenCalledWith("[2026-03-02T08:00:00.000Z] WARN  shown");
	});

	it("attaches a thrown value to an error record", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		createLogger({ component: "db" }).error("Query failed", "connection reset");

		expect(error).toHaveBeenCalledWith(
			'[2026-03-02T08:00:00.000Z] ERROR Query failed {"component":"db","error":"connection reset"}'
		);
	});

	it("describes an Error by name and message", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		createLogger().error("Failed to start server", new TypeError("port in use"));

		const [line] = error.mock.calls[0];
		expect(line).toContain('"name":"TypeError","message":"port in use","stack":');
	});
});
