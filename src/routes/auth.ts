/**
 * Auth Routes
 * Username + password login and token verification
 */

import { Router } from "express";
import { StatusCodes } from "http-status-codes";
import { z } from "zod";

import { AccessPolicies } from "../config/accessPolicies.ts";
import { getStringValidationSchema } from "../config/zodSchemas.ts";
import type { AuthGuard } from "../middleware/authMiddleware.ts";
import type { UserRepository } from "../repositories/userRepository.ts";
import { toHTTPError } from "../services/auth/authErrors.ts";
import type { AuthService } from "../services/auth/authService.ts";
import { toPublicUser } from "../services/users/publicUser.ts";
import expressAsyncHandler, { expressValidatedHandler } from "../utils/expressAsyncHandler.ts";
import { getCurrentUser } from "./currentUser.ts";

export const LoginDataSchema = z.object({
	username: getStringValidationSchema("Username"),
	password: getStringValidationSchema("Password"),
});

interface AuthRouterDependencies {
	authService: AuthService;
	users: UserRepository;
	requireAuth: AuthGuard;
}

export function createAuthRouter({ authService, users, requireAuth }: AuthRouterDependencies) {
	const authRouter = Router();

	// ============================================
	// Login
	// ============================================
	authRouter.post(
		"/login",
		expressValidatedHandler(
			async (validatedData, req, res) => {
				const result = await authService.login(validatedData.username, validatedData.password, {
					ipAddress: req.clientIp,
					userAgent: req.clientUserAgent,
					requestId: req.requestId,
				});

				if (!result.ok) {
					throw toHTTPError(result.error);
				}

				const { token, role, expiresAt, user } = result.value;
				return res.status(StatusCodes.OK).json({
					token,
					role,
					expiresAt: expiresAt.toISOString(),
					user,
				});
			},
			{
				validationSchema: LoginDataSchema,
				getValue: (req) => req.body,
			}
		)
	);

	// ============================================
	// Verify
	// ============================================
	authRouter.get(
		"/verify",
		requireAuth(AccessPolicies.SESSION),
		expressAsyncHandler(async (req, res) => {
			const user = await getCurrentUser(users, req);
			return res.status(StatusCodes.OK).json({
				valid: true,
				user: toPublicUser(user),
			});
		})
	);

	return authRouter;
}
