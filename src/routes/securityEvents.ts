import { Router } from "express";
import { StatusCodes } from "http-status-codes";
import { z } from "zod";

import { AccessPolicies } from "../config/accessPolicies.ts";
import { getNumberValidationSchema } from "../config/zodSchemas.ts";
import { SecurityEventKinds } from "../db/index.ts";
import type { AuthGuard } from "../middleware/authMiddleware.ts";
import { normaliseIdentity } from "../services/auth/lockoutTracker.ts";
import type { SecurityEventService } from "../services/securityEventService.ts";
import { expressValidatedHandler } from "../utils/expressAsyncHandler.ts";

const SecurityEventQuerySchema = z.object({
	identity: z.string().min(1).transform(normaliseIdentity).optional(),
	kind: z
		.enum([
			SecurityEventKinds.LOGIN_SUCCESS,
			SecurityEventKinds.LOGIN_FAILED,
			SecurityEventKinds.LOGIN_BLOCKED,
		])
		.optional(),
	limit: getNumberValidationSchema("limit").int().min(1).max(200).default(50),
	offset: getNumberValidationSchema("offset").int().min(0).default(0),
});

interface SecurityEventRouterDependencies {
	securityEvents: SecurityEventService;
	requireAuth: AuthGuard;
}

export function createSecurityEventRouter({
	securityEvents,
	requireAuth,
}: SecurityEventRouterDependencies) {
	const router = Router();

	/**
	 * GET /security-events?identity=&kind=&limit=&offset=
	 * Newest first
	 */
	router.get(
		"/",
		requireAuth(AccessPolicies.SECURITY_EVENTS_READ),
		expressValidatedHandler(
			async (filters, _req, res) => {
				const page = await securityEvents.list(filters);
				return res.status(StatusCodes.OK).json(page);
			},
			{
				validationSchema: SecurityEventQuerySchema,
				getValue: (req) => req.query,
			}
		)
	);

	return router;
}
