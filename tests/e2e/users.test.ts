/**
 * E2E Test: User management
 */

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { fixtures, idOf, startTestApp } from "./setup.ts";
import type { TestApp } from "./setup.ts";

describe("Users", () => {
	let app: TestApp;
	let adminToken: string;
	let operatorId: number;

	beforeAll(async () => {
		app = await startTestApp();
		adminToken = await app.login(fixtures.admin.username, fixtures.admin.password);
	});

	afterAll(async () => {
		await app.close();
	});

	it("should create an operator account", async () => {
		const response = await app.request(
			"POST",
			"/api/users",
			{
				username: "Operario1",
				email: "Operario1@Plant.Example",
				password: fixtures.operator.password,
				fullName: "operario uno",
			},
			adminToken
		);

		expect(response.status).toBe(201);
		expect(response.data).toMatchObject({
			payload: {
				username: "operario1",
				email: "operario1@plant.example",
				fullName: "Operario Uno",
				role: "USER",
				status: "ACTIVE",
			},
		});
		expect(response.data).not.toHaveProperty("payload.passwordHash");
		operatorId = idOf(response);
	});

	it("should let the new operator log in", async () => {
		const token = await app.login(fixtures.operator.username, fixtures.operator.password);
		expect(token.split(".")).toHaveLength(3);
	});

	it("should keep user management for the administrator", async () => {
		const token = await app.login(fixtures.operator.username, fixtures.operator.password);

		const response = await app.request("GET", "/api/users", undefined, token);
		expect(response.status).toBe(403);
	});

	it("should reject a duplicate username", async () => {
		const response = await app.request(
			"POST",
			"/api/users",
			{
				username: "operario1",
				email: "other@plant.example",
				password: fixtures.operator.password,
				fullName: "Someone Else",
			},
			adminToken
		);

		expect(response.status).toBe(409);
		expect(response.data).toHaveProperty("error", "User operario1 already exists");
	});

	it("should reject a short password", async () => {
		const response = await app.request(
			"POST",
			"/api/users",
			{
				username: "operario2",
				email: "operario2@plant.example",
				password: "short",
				fullName: "Operario Dos",
			},
			adminToken
		);

		expect(response.status).toBe(400);
		expect(response.data).toHaveProperty("reason.password", [
			"Password cannot have less than 8 characters.",
		]);
	});

	it("should list and search users", async () => {
		const all = await app.request("GET", "/api/users", undefined, adminToken);
		expect(all.data).toMatchObject({ payload: { total: 2 } });

		const search = await app.request("GET", "/api/users?search=uno", undefined, adminToken);
		expect(search.data).toMatchObject({
			payload: { total: 1, users: [{ id: operatorId, username: "operario1" }] },
		});

		const admins = await app.request("GET", "/api/users?role=ADMIN", undefined, adminToken);
		expect(admins.data).toMatchObject({
			payload: { total: 1, users: [{ username: fixtures.admin.username }] },
		});
	});

	it("should update a user", async () => {
		const response = await app.request(
			"PUT",
			`/api/users/${operatorId}`,
			{ fullName: "operario uno bis" },
			adminToken
		);

		expect(response.status).toBe(200);
		expect(response.data).toHaveProperty("payload.fullName", "Operario Uno Bis");
	});

	it("should not promote an operator", async () => {
		const response = await app.request(
			"PUT",
			`/api/users/${operatorId}`,
			{ role: "ADMIN" },
			adminToken
		);

		expect(response.status).toBe(403);
	});

	it("should disable and reactivate an operator", async () => {
		const disabled = await app.request("DELETE", `/api/users/${operatorId}`, undefined, adminToken);
		expect(disabled.status).toBe(200);
		expect(disabled.data).toMatchObject({
			payload: { message: "User disabled", user: { status: "DISABLED" } },
		});

		const login = await app.request("POST", "/api/auth/login", {
			username: fixtures.operator.username,
			password: fixtures.operator.password,
		});
		expect(login.status).toBe(403);

		const activated = await app.request(
			"PUT",
			`/api/users/${operatorId}/activate`,
			undefined,
			adminToken
		);
		expect(activated.status).toBe(200);
		expect(activated.data).toHaveProperty("payload.user.status", "ACTIVE");
	});

	it("should keep the administrator active", async () => {
		const admin = await app.context.repositories.users.findByUsername(fixtures.admin.username);
		expect(admin).not.toBeNull();

		const response = await app.request("DELETE", `/api/users/${admin?.id}`, undefined, adminToken);
		expect(response.status).toBe(400);
		expect(response.data).toHaveProperty("error", "The administrator cannot be disabled");
	});

	it("should keep surrounding spaces in a password", async () => {
		const password = "  spaced secret  ";
		const created = await app.request(
			"POST",
			"/api/users",
			{
				username: "operario3",
				email: "operario3@plant.example",
				password,
				fullName: "Operario Tres",
			},
			adminToken
		);
		expect(created.status).toBe(201);

		const login = await app.request("POST", "/api/auth/login", { username: "operario3", password });
		expect(login.status).toBe(200);

		const trimmed = await app.request("POST", "/api/auth/login", {
			username: "operario3",
			password: password.trim(),
		});
		expect(trimmed.status).toBe(401);
	});

	it("should reject a password longer than 72 bytes", async () => {
		const response = await app.request(
			"POST",
			"/api/users",
			{
				username: "operario4",
				email: "operario4@plant.example",
				password: "ñ".repeat(40),
				fullName: "Operario Cuatro",
			},
			adminToken
		);

		expect(response.status).toBe(400);
		expect(response.data).toHaveProperty("reason.password", [
			"Password cannot be longer than 72 bytes.",
		]);
	});
});
