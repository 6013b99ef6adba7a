import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import { Roles, UserStatuses } from "../../db/index.ts";
import { DuplicateEntryError } from "../../repositories/errors.ts";
import type { UserRepository } from "../../repositories/userRepository.ts";
import type { PasswordHasher } from "../../utils/hashingTools.ts";
import { toTitleCase } from "../../utils/textFormat.ts";
import { Service } from "../index.ts";
import { toPublicUser } from "./publicUser.ts";
import type { PublicUser } from "./publicUser.ts";
import type { CreateUserData } from "./schemas.ts";

export { CreateUserDataSchema } from "./schemas.ts";

/**
 * Provisions an operator account. The single administrator is created by
 * the seed script, never through this service.
 */
class CreateUserService extends Service<CreateUserData, PublicUser> {
	constructor(
		data: CreateUserData,
		private readonly users: UserRepository,
		private readonly hasher: PasswordHasher
	) {
		super(data);
	}

	async handle(): Promise<PublicUser> {
		if (this.data.role === Roles.ADMIN) {
			throw new HTTPError({
				httpStatus: StatusCodes.FORBIDDEN,
				message: "Administrator accounts cannot be created",
			});
		}

		const username = this.data.username.toLowerCase();
		const email = this.data.email.trim().toLowerCase();

		if (await this.users.findByUsername(username)) {
			throw this.conflict("username", username);
		}
		if (await this.users.findByEmail(email)) {
			throw this.conflict("email", email);
		}

		const passwordHash = await this.hasher.hash(this.data.password);
		try {
			const user = await this.users.create({
				username,
				email,
				fullName: toTitleCase(this.data.fullName),
				passwordHash,
				role: Roles.USER,
				status: UserStatuses.ACTIVE,
			});
			return toPublicUser(user);
		} catch (error) {
			// Another request took the name between the lookup and the insert
			if (error instanceof DuplicateEntryError) {
				throw this.conflict(error.field, error.value);
			}
			throw error;
		}
	}

	private conflict(field: DuplicateEntryError["field"], value: string): HTTPError {
		return new HTTPError({
			httpStatus: StatusCodes.CONFLICT,
			message:
				field === "email"
					? `Email ${value} is already registered`
					: `User ${value} already exists`,
		});
	}
}

export default CreateUserService;
