/**
 * User Routes
 * Account management (administrator only)
 */

import { Router } from "express";
import { StatusCodes } from "http-status-codes";
import { z } from "zod";

import { AccessPolicies } from "../config/accessPolicies.ts";
import { HTTPError } from "../config/error.ts";
import ErrorMessages from "../config/errorMessages.ts";
import { idParamsSchema } from "../config/zodSchemas.ts";
import { UserStatuses } from "../db/index.ts";
import type { AuthGuard } from "../middleware/authMiddleware.ts";
import type { UserRepository } from "../repositories/userRepository.ts";
import CreateUserService, { CreateUserDataSchema } from "../services/users/createUser.ts";
import { toPublicUser } from "../services/users/publicUser.ts";
import { UserListQuerySchema } from "../services/users/schemas.ts";
import SetUserStatusService from "../services/users/setUserStatus.ts";
import UpdateUserService, { UpdateUserBodySchema } from "../services/users/updateUser.ts";
import type { PasswordHasher } from "../utils/hashingTools.ts";
import { expressValidatedHandler } from "../utils/expressAsyncHandler.ts";

const UpdateUserRequestSchema = z.object({
	params: idParamsSchema,
	body: UpdateUserBodySchema,
});

interface UserRouterDependencies {
	users: UserRepository;
	hasher: PasswordHasher;
	requireAuth: AuthGuard;
}

export function createUserRouter({ users, hasher, requireAuth }: UserRouterDependencies) {
	const router = Router();

	router.use(requireAuth(AccessPolicies.USERS_MANAGE));

	/**
	 * GET /users?search=&role=&status=
	 */
	router.get(
		"/",
		expressValidatedHandler(
			async (filters, _req, res) => {
				const list = await users.list(filters);
				return res.status(StatusCodes.OK).json({
					total: list.length,
					users: list.map(toPublicUser),
				});
			},
			{
				validationSchema: UserListQuerySchema,
				getValue: (req) => req.query,
			}
		)
	);

	router.get(
		"/:id",
		expressValidatedHandler(
			async ({ id }, _req, res) => {
				const user = await users.findById(id);
				if (!user) {
					throw new HTTPError({
						httpStatus: StatusCodes.NOT_FOUND,
						message: ErrorMessages.USER_NOT_FOUND,
					});
				}
				return res.status(StatusCodes.OK).json(toPublicUser(user));
			},
			{
				validationSchema: idParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	router.post(
		"/",
		expressValidatedHandler(
			async (validatedData, _req, res) => {
				const user = await new CreateUserService(validatedData, users, hasher).execute();
				return res.status(StatusCodes.CREATED).json(user);
			},
			{
				validationSchema: CreateUserDataSchema,
				getValue: (req) => req.body,
			}
		)
	);

	router.put(
		"/:id",
		expressValidatedHandler(
			async ({ params, body }, _req, res) => {
				const user = await new UpdateUserService(
					{ id: params.id, changes: body },
					users,
					hasher
				).execute();
				return res.status(StatusCodes.OK).json(user);
			},
			{
				validationSchema: UpdateUserRequestSchema,
				getValue: (req) => ({ params: req.params, body: req.body }),
			}
		)
	);

	/**
	 * DELETE /users/:id
	 * Disables the account; nothing is removed
	 */
	router.delete(
		"/:id",
		expressValidatedHandler(
			async ({ id }, _req, res) => {
				const user = await new SetUserStatusService(
					{ id, status: UserStatuses.DISABLED },
					users
				).execute();
				return res.status(StatusCodes.OK).json({ message: "User disabled", user });
			},
			{
				validationSchema: idParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	router.put(
		"/:id/activate",
		expressValidatedHandler(
			async ({ id }, _req, res) => {
				const user = await new SetUserStatusService(
					{ id, status: UserStatuses.ACTIVE },
					users
				).execute();
				return res.status(StatusCodes.OK).json({ message: "User activated", user });
			},
			{
				validationSchema: idParamsSchema,
				getValue: (req) => req.params,
			}
		)
	);

	return router;
}
