import { createHmac, timingSafeEqual } from "crypto";
import { default as jwt } from "jsonwebtoken";
import type { JwtPayload, VerifyErrors } from "jsonwebtoken";
import { z } from "zod";

import { Roles } from "../db/schema/users.ts";
import type { Role } from "../db/schema/users.ts";
import type { Clock } from "./clock.ts";
import { systemClock } from "./clock.ts";

const { sign: jwtSign, verify: jwtVerify, decode: jwtDecode, TokenExpiredError } = jwt;

const JWT_ALGORITHM = "HS256";

// header.payload.signature, each non-empty base64url
const COMPACT_JWT_PATTERN = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

export const TokenFailureReasons = {
	MISSING: "MISSING",
	MALFORMED: "MALFORMED",
	INVALID_SIGNATURE: "INVALID_SIGNATURE",
	EXPIRED: "EXPIRED",
} as const;

export type TokenFailureReason =
	(typeof TokenFailureReasons)[keyof typeof TokenFailureReasons];

const TokenClaimsSchema = z.object({
	sub: z.string().min(1),
	role: z.enum([Roles.ADMIN, Roles.USER]),
	iat: z.number().int(),
	exp: z.number().int(),
});

/**
 * Claims carried by an access token
 */
export interface TokenPayload extends JwtPayload {
	sub: string;
	role: Role;
	iat: number;
	exp: number;
}

export interface VerifiedToken {
	identity: string;
	role: Role;
	issuedAt: Date;
	expiresAt: Date;
}

export interface IssuedToken {
	token: string;
	issuedAt: Date;
	expiresAt: Date;
}

export type TokenVerification =
	| { ok: true; token: VerifiedToken }
	| { ok: false; reason: TokenFailureReason };

export interface TokenServiceOptions {
	secret: string;
	lifetimeSeconds: number;
	clock?: Clock;
}

const toEpochSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

// HS256 over `header.payload`, whatever the segments decode to
const hasValidSignature = (token: string, secret: string): boolean => {
	const [header, payload, signature] = token.split(".");
	const expected = Buffer.from(
		createHmac("sha256", secret).update(`${header}.${payload}`).digest("base64url")
	);
	const given = Buffer.from(signature);
	return given.length === expected.length && timingSafeEqual(given, expected);
};

const classifyVerifyError = (
	err: VerifyErrors,
	token: string,
	secret: string
): TokenFailureReason => {
	if (err instanceof TokenExpiredError) {
		return TokenFailureReasons.EXPIRED;
	}
	// jsonwebtoken stops before the signature when the header is not a JSON
	// object; a token signed with our secret is then malformed, anything else forged
	if (jwtDecode(token, { complete: true }) === null && hasValidSignature(token, secret)) {
		return TokenFailureReasons.MALFORMED;
	}
	return TokenFailureReasons.INVALID_SIGNATURE;
};

/**
 * Issues and verifies HS256 access tokens.
 * The secret is fixed for the lifetime of the instance; rotating it
 * invalidates every token issued before.
 */
export class TokenService {
	private readonly secret: string;
	private readonly lifetimeSeconds: number;
	private readonly clock: Clock;

	constructor({ secret, lifetimeSeconds, clock = systemClock }: TokenServiceOptions) {
		this.secret = secret;
		this.lifetimeSeconds = lifetimeSeconds;
		this.clock = clock;
	}

	get lifetime(): number {
		return this.lifetimeSeconds;
	}

	issue(identity: string, role: Role): Promise<IssuedToken> {
		const iat = toEpochSeconds(this.clock());
		const exp = iat + this.lifetimeSeconds;
		const payload: TokenPayload = { sub: identity, role, iat, exp };

		return new Promise((resolve, reject) =>
			jwtSign(payload, this.secret, { algorithm: JWT_ALGORITHM }, (err, token) =>
				err || !token
					? reject(err ?? new Error("Token signing produced no token"))
					: resolve({
							token,
							issuedAt: new Date(iat * 1000),
							expiresAt: new Date(exp * 1000),
						})
			)
		);
	}

	/**
	 * Checks structure, then signature, then expiry, then claim shape.
	 * Resolves with the first failing step; never rejects.
	 */
	verify(token: string): Promise<TokenVerification> {
		if (!COMPACT_JWT_PATTERN.test(token)) {
			return Promise.resolve({ ok: false, reason: TokenFailureReasons.MALFORMED });
		}

		return new Promise((resolve) =>
			jwtVerify(
				token,
				this.secret,
				{
					algorithms: [JWT_ALGORITHM],
					clockTimestamp: toEpochSeconds(this.clock()),
				},
				(err, decoded) => {
					if (err) {
						return resolve({
							ok: false,
							reason: classifyVerifyError(err, token, this.secret),
						});
					}

					const claims = TokenClaimsSchema.safeParse(decoded);
					if (!claims.success) {
						return resolve({ ok: false, reason: TokenFailureReasons.MALFORMED });
					}

					resolve({
						ok: true,
						token: {
							identity: claims.data.sub,
							role: claims.data.role,
							issuedAt: new Date(claims.data.iat * 1000),
							expiresAt: new Date(claims.data.exp * 1000),
						},
					});
				}
			)
		);
	}
}
