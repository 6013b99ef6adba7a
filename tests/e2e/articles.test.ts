/**
 * E2E Test: Article inventory
 */

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { fixtures, idOf, startTestApp } from "./setup.ts";
import type { TestApp } from "./setup.ts";

describe("Articles", () => {
	let app: TestApp;
	let adminToken: string;
	let operatorToken: string;

	beforeAll(async () => {
		app = await startTestApp();
		await app.createOperator();
		adminToken = await app.login(fixtures.admin.username, fixtures.admin.password);
		operatorToken = await app.login(fixtures.operator.username, fixtures.operator.password);
	});

	afterAll(async () => {
		await app.close();
	});

	describe("Access Control", () => {
		it("should require authentication to list articles", async () => {
			const response = await app.request("GET", "/api/articles");
			expect(response.status).toBe(401);
		});

		it("should not let an operator create articles", async () => {
			const response = await app.request(
				"POST",
				"/api/articles",
				{ code: "PMP-900", name: "Booster pump" },
				operatorToken
			);

			expect(response.status).toBe(403);
			expect(response.data).toEqual({
				status: 403,
				error: "You do not have permission to perform this action.",
				reason: { code: "FORBIDDEN", requiredRole: "ADMIN" },
			});
		});
	});

	describe("CRUD", () => {
		let articleId: number;

		it("should create an article", async () => {
			const response = await app.request(
				"POST",
				"/api/articles",
				{
					code: "pmp-001",
					name: "centrifugal pump",
					type: "Machinery",
					category: "pumps",
					location: "warehouse a",
					stockMin: 1,
					stockCurrent: 3,
					acquisitionDate: "2024-05-20",
				},
				adminToken
			);

			expect(response.status).toBe(201);
			expect(response.data).toMatchObject({
				status: 201,
				message: "Created",
				payload: {
					code: "PMP-001",
					name: "Centrifugal Pump",
					category: "Pumps",
					location: "Warehouse A",
					unit: "unit",
					status: "OPERATIONAL",
					acquisitionDate: "2024-05-20",
				},
			});
			articleId = idOf(response);
		});

		it("should reject invalid input", async () => {
			const response = await app.request(
				"POST",
				"/api/articles",
				{ code: "P1", name: "Pump", stockCurrent: -1 },
				adminToken
			);

			expect(response.status).toBe(400);
			expect(response.data).toMatchObject({
				error: "Validation failed",
				reason: {
					code: ["Code cannot have less than 3 characters."],
					stockCurrent: ["Current stock cannot be negative"],
				},
			});
		});

		it("should reject a duplicate code", async () => {
			const response = await app.request(
				"POST",
				"/api/articles",
				{ code: "PMP-001", name: "Another pump" },
				adminToken
			);

			expect(response.status).toBe(409);
		});

		it("should let operators read articles", async () => {
			const list = await app.request("GET", "/api/articles", undefined, operatorToken);
			expect(list.status).toBe(200);
			expect(list.data).toMatchObject({ payload: [{ id: articleId, code: "PMP-001" }] });

			const single = await app.request("GET", `/api/articles/${articleId}`, undefined, operatorToken);
			expect(single.status).toBe(200);
			expect(single.data).toHaveProperty("payload.name", "Centrifugal Pump");
		});

		it("should answer 404 for an unknown article", async () => {
			const response = await app.request("GET", "/api/articles/999", undefined, operatorToken);
			expect(response.status).toBe(404);
			expect(response.data).toHaveProperty("error", "Article not found.");
		});

		it("should report whether a code exists", async () => {
			const taken = await app.request("GET", "/api/articles/check-code/pmp-001", undefined, operatorToken);
			expect(taken.data).toHaveProperty("payload", { exists: true });

			const free = await app.request("GET", "/api/articles/check-code/PMP-002", undefined, operatorToken);
			expect(free.data).toHaveProperty("payload", { exists: false });
		});

		it("should suggest values for autocompletion", async () => {
			const response = await app.request(
				"GET",
				"/api/articles/suggestions?field=category&query=pu",
				undefined,
				operatorToken
			);
			expect(response.data).toHaveProperty("payload", ["Pumps"]);

			const tooShort = await app.request(
				"GET",
				"/api/articles/suggestions?field=category&query=p",
				undefined,
				operatorToken
			);
			expect(tooShort.data).toHaveProperty("payload", []);
		});

		it("should update only the given fields", async () => {
			const response = await app.request(
				"PUT",
				`/api/articles/${articleId}`,
				{ stockCurrent: 0, location: "workshop" },
				adminToken
			);

			expect(response.status).toBe(200);
			expect(response.data).toMatchObject({
				payload: {
					code: "PMP-001",
					name: "Centrifugal Pump",
					stockCurrent: 0,
					location: "Workshop",
				},
			});
		});

		it("should not delete an article that has reports", async () => {
			const report = await app.request(
				"POST",
				"/api/reports",
				{ articleId, reportType: "FAILURE", message: "Bearing noise" },
				operatorToken
			);
			expect(report.status).toBe(201);

			const response = await app.request("DELETE", `/api/articles/${articleId}`, undefined, adminToken);
			expect(response.status).toBe(409);
		});

		it("should delete an article without reports", async () => {
			const created = await app.request(
				"POST",
				"/api/articles",
				{ code: "VLV-001", name: "Gate valve" },
				adminToken
			);
			const id = idOf(created);

			const response = await app.request("DELETE", `/api/articles/${id}`, undefined, adminToken);
			expect(response.status).toBe(200);
			expect(response.data).toHaveProperty("payload", { message: "Article deleted" });

			const gone = await app.request("GET", `/api/articles/${id}`, undefined, adminToken);
			expect(gone.status).toBe(404);
		});
	});
});
