import type { Request } from "express";
import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../config/error.ts";
import ErrorMessages from "../config/errorMessages.ts";
import type { User } from "../db/index.ts";
import type { UserRepository } from "../repositories/userRepository.ts";

/**
 * Load the account behind the authenticated principal.
 * A token may outlive its user, which answers 404.
 */
export async function getCurrentUser(users: UserRepository, req: Request): Promise<User> {
	if (!req.principal) {
		throw new HTTPError({
			httpStatus: StatusCodes.UNAUTHORIZED,
			message: ErrorMessages.AUTHENTICATION_REQUIRED,
		});
	}

	const user = await users.findByUsername(req.principal.identity);
	if (!user) {
		throw new HTTPError({
			httpStatus: StatusCodes.NOT_FOUND,
			message: ErrorMessages.USER_NOT_FOUND,
		});
	}
	return user;
}
