import type { RequestHandler } from "express";

import type { AccessPolicy } from "../config/accessPolicies.ts";
import type { AuthService } from "../services/auth/authService.ts";
import { toHTTPError } from "../services/auth/authErrors.ts";

const BEARER_PREFIX = "Bearer ";

export const getBearerToken = (header: string | undefined): string | undefined => {
	if (!header || !header.startsWith(BEARER_PREFIX)) return undefined;
	const token = header.slice(BEARER_PREFIX.length).trim();
	return token || undefined;
};

/**
 * Builds per-policy guards. A passing request carries `req.principal`.
 */
const authMiddlewareCreator =
	(authService: AuthService) =>
	(policy: AccessPolicy): RequestHandler =>
	(req, _res, next) => {
		authService
			.authorize(getBearerToken(req.headers.authorization), policy)
			.then((result) => {
				if (!result.ok) return next(toHTTPError(result.error));
				req.principal = result.value;
				next();
			})
			.catch(next);
	};

export type AuthGuard = ReturnType<typeof authMiddlewareCreator>;

export default authMiddlewareCreator;
