/**
 * E2E Test: Security event log
 */

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { fixtures, startTestApp } from "./setup.ts";
import type { TestApp } from "./setup.ts";

describe("Security events", () => {
	let app: TestApp;
	let adminToken: string;

	beforeAll(async () => {
		app = await startTestApp();
		await app.createOperator();
		adminToken = await app.login(fixtures.admin.username, fixtures.admin.password);

		await fetch(`${app.baseUrl}/api/auth/login`, {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				"User-Agent": "plant-terminal/1.0",
				"X-Forwarded-For": "10.20.30.40, 10.0.0.1",
				"X-Request-ID": "req-e2e-1",
			},
			body: JSON.stringify({ username: "Operario1", password: "wrong-password" }),
		});
	});

	afterAll(async () => {
		await app.close();
	});

	it("should be readable only by the administrator", async () => {
		const token = await app.login(fixtures.operator.username, fixtures.operator.password);

		const response = await app.request("GET", "/api/security-events", undefined, token);
		expect(response.status).toBe(403);
	});

	it("should record failed logins with their request context", async () => {
		const response = await app.request(
			"GET",
			"/api/security-events?identity=OPERARIO1&kind=LOGIN_FAILED",
			undefined,
			adminToken
		);

		expect(response.status).toBe(200);
		expect(response.data).toMatchObject({
			payload: {
				total: 1,
				events: [
					{
						identity: "operario1",
						kind: "LOGIN_FAILED",
						outcome: "INVALID_CREDENTIALS",
						ipAddress: "10.20.30.40",
						userAgent: "plant-terminal/1.0",
						requestId: "req-e2e-1",
					},
				],
			},
		});
	});

	it("should list events newest first", async () => {
		const response = await app.request(
			"GET",
			"/api/security-events?identity=operario1&limit=1",
			undefined,
			adminToken
		);

		expect(response.data).toMatchObject({
			payload: { total: 2, events: [{ kind: "LOGIN_SUCCESS", outcome: "SUCCESS" }] },
		});
	});

	it("should validate paging parameters", async () => {
		const response = await app.request(
			"GET",
			"/api/security-events?limit=500",
			undefined,
			adminToken
		);

		expect(response.status).toBe(400);
		expect(response.data).toHaveProperty("reason.limit");
	});
});
