import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import { Roles } from "../../db/index.ts";
import { DuplicateEntryError } from "../../repositories/errors.ts";
import type { UserChanges, UserRepository } from "../../repositories/userRepository.ts";
import type { PasswordHasher } from "../../utils/hashingTools.ts";
import { toTitleCase } from "../../utils/textFormat.ts";
import { Service } from "../index.ts";
import { toPublicUser } from "./publicUser.ts";
import type { PublicUser } from "./publicUser.ts";
import type { UpdateUserBody } from "./schemas.ts";

export { UpdateUserBodySchema } from "./schemas.ts";

export interface UpdateUserData {
	id: number;
	changes: UpdateUserBody;
}

const emailInUse = (email: string) =>
	new HTTPError({
		httpStatus: StatusCodes.CONFLICT,
		message: `Email ${email} is already in use`,
	});

class UpdateUserService extends Service<UpdateUserData, PublicUser> {
	constructor(
		data: UpdateUserData,
		private readonly users: UserRepository,
		private readonly hasher: PasswordHasher
	) {
		super(data);
	}

	async handle(): Promise<PublicUser> {
		const { id, changes } = this.data;

		const user = await this.users.findById(id);
		if (!user) {
			throw new HTTPError({
				httpStatus: StatusCodes.NOT_FOUND,
				message: ErrorMessages.USER_NOT_FOUND,
			});
		}

		if (user.role === Roles.ADMIN && changes.role === Roles.USER) {
			throw new HTTPError({
				httpStatus: StatusCodes.BAD_REQUEST,
				message: "The administrator role cannot be changed",
			});
		}
		if (user.role !== Roles.ADMIN && changes.role === Roles.ADMIN) {
			throw new HTTPError({
				httpStatus: StatusCodes.FORBIDDEN,
				message: "Users cannot be promoted to administrator",
			});
		}

		const update: UserChanges = {};

		if (changes.fullName !== undefined) {
			update.fullName = toTitleCase(changes.fullName);
		}

		if (changes.email !== undefined) {
			const email = changes.email.trim().toLowerCase();
			const existing = await this.users.findByEmail(email);
			if (existing && existing.id !== user.id) {
				throw emailInUse(email);
			}
			update.email = email;
		}

		if (changes.password !== undefined) {
			update.passwordHash = await this.hasher.hash(changes.password);
		}

		try {
			const updated = await this.users.update(user.id, update);
			return toPublicUser(updated ?? user);
		} catch (error) {
			if (error instanceof DuplicateEntryError && error.field === "email") {
				throw emailInUse(error.value);
			}
			throw error;
		}
	}
}

export default UpdateUserService;
