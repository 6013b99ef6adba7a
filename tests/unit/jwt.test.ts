import { createHmac } from "crypto";

import jwt from "jsonwebtoken";
import { beforeEach, describe, expect, it } from "vitest";

import { Roles } from "../../src/db/index.ts";
import { TokenFailureReasons, TokenService } from "../../src/utils/jwt.ts";

const SECRET = "test-secret";
const DAY_SECONDS = 24 * 60 * 60;
const ISSUED_AT = new Date("2026-03-02T08:00:00.000Z");

const base64url = (text: string) => Buffer.from(text).toString("base64url");

// Compact token with arbitrary segment text, HMAC-signed with `secret`
const signRaw = (header: string, payload: string, secret: string) => {
	const signingInput = `${base64url(header)}.${base64url(payload)}`;
	const signature = createHmac("sha256", secret).update(signingInput).digest("base64url");
	return `${signingInput}.${signature}`;
};

describe("TokenService", () => {
	let now: Date;
	let tokens: TokenService;

	beforeEach(() => {
		now = ISSUED_AT;
		tokens = new TokenService({ secret: SECRET, lifetimeSeconds: DAY_SECONDS, clock: () => now });
	});

	it("issues a token that verifies immediately", async () => {
		const issued = await tokens.issue("operario1", Roles.USER);

		expect(issued.issuedAt).toEqual(ISSUED_AT);
		expect(issued.expiresAt).toEqual(new Date(ISSUED_AT.getTime() + DAY_SECONDS * 1000));
		expect(await tokens.verify(issued.token)).toEqual({
			ok: true,
			token: {
				identity: "operario1",
				role: Roles.USER,
				issuedAt: issued.issuedAt,
				expiresAt: issued.expiresAt,
			},
		});
	});

	it("accepts the token until its lifetime has elapsed", async () => {
		const { token } = await tokens.issue("admin", Roles.ADMIN);

		now = new Date(ISSUED_AT.getTime() + (DAY_SECONDS - 1) * 1000);
		expect((await tokens.verify(token)).ok).toBe(true);

		now = new Date(ISSUED_AT.getTime() + DAY_SECONDS * 1000);
		expect(await tokens.verify(token)).toEqual({
			ok: false,
			reason: TokenFailureReasons.EXPIRED,
		});
	});

	it("rejects a token signed with another secret", async () => {
		const other = new TokenService({ secret: "other-secret", lifetimeSeconds: DAY_SECONDS, clock: () => now });
		const { token } = await other.issue("operario1", Roles.USER);

		expect(await tokens.verify(token)).toEqual({
			ok: false,
			reason: TokenFailureReasons.INVALID_SIGNATURE,
		});
	});

	it("rejects every single-character tampering with a signature failure", async () => {
		const { token } = await tokens.issue("operario1", Roles.USER);

		for (let index = 0; index < token.length; index++) {
			if (token[index] === ".") continue;
			const replacement = token[index] === "A" ? "B" : "A";
			const tampered = token.slice(0, index) + replacement + token.slice(index + 1);

			expect(await tokens.verify(tampered), `position ${index}`).toEqual({
				ok: false,
				reason: TokenFailureReasons.INVALID_SIGNATURE,
			});
		}
	});

	it("reports a signature failure before expiry", async () => {
		const { token } = await tokens.issue("operario1", Roles.USER);
		now = new Date(ISSUED_AT.getTime() + 2 * DAY_SECONDS * 1000);

		const tampered = token.slice(0, -1) + (token.endsWith("A") ? "B" : "A");
		expect(await tokens.verify(tampered)).toEqual({
			ok: false,
			reason: TokenFailureReasons.INVALID_SIGNATURE,
		});
	});

	it.each(["", "not-a-token", "a.b", "a.b.c.d", "a..c", "a.b.c d"])(
		"rejects the malformed token %j",
		async (token) => {
			expect(await tokens.verify(token)).toEqual({
				ok: false,
				reason: TokenFailureReasons.MALFORMED,
			});
		}
	);

	const claims = JSON.stringify({
		sub: "operario1",
		role: Roles.USER,
		iat: Math.floor(ISSUED_AT.getTime() / 1000),
		exp: Math.floor(ISSUED_AT.getTime() / 1000) + DAY_SECONDS,
	});

	describe("header that is not JSON", () => {
		it("is malformed when signed with the service secret", async () => {
			expect(await tokens.verify(signRaw("not json", claims, SECRET))).toEqual({
				ok: false,
				reason: TokenFailureReasons.MALFORMED,
			});
		});

		it("is a signature failure when signed with another secret", async () => {
			expect(await tokens.verify(signRaw("not json", claims, "other-secret"))).toEqual({
				ok: false,
				reason: TokenFailureReasons.INVALID_SIGNATURE,
			});
		});
	});

	it("accepts a hand-signed token with a regular header", async () => {
		const header = JSON.stringify({ alg: "HS256", typ: "JWT" });

		expect(await tokens.verify(signRaw(header, claims, SECRET))).toMatchObject({
			ok: true,
			token: { identity: "operario1", role: Roles.USER },
		});
	});

	it("rejects a correctly signed token with unexpected claims", async () => {
		const token = jwt.sign({ sub: "operario1", role: "OWNER" }, SECRET, {
			algorithm: "HS256",
		});

		expect(await tokens.verify(token)).toEqual({
			ok: false,
			reason: TokenFailureReasons.MALFORMED,
		});
	});

	it("exposes the configured lifetime", () => {
		expect(tokens.lifetime).toBe(DAY_SECONDS);
	});
});
