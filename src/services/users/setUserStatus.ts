import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import { Roles, UserStatuses } from "../../db/index.ts";
import type { UserStatus } from "../../db/index.ts";
import type { UserRepository } from "../../repositories/userRepository.ts";
import { Service } from "../index.ts";
import { toPublicUser } from "./publicUser.ts";
import type { PublicUser } from "./publicUser.ts";

interface SetUserStatusData {
	id: number;
	status: UserStatus;
}

/**
 * Accounts are disabled, never deleted. Administrators stay active.
 */
class SetUserStatusService extends Service<SetUserStatusData, PublicUser> {
	constructor(
		data: SetUserStatusData,
		private readonly users: UserRepository
	) {
		super(data);
	}

	async handle(): Promise<PublicUser> {
		const user = await this.users.findById(this.data.id);
		if (!user) {
			throw new HTTPError({
				httpStatus: StatusCodes.NOT_FOUND,
				message: ErrorMessages.USER_NOT_FOUND,
			});
		}

		if (user.role === Roles.ADMIN && this.data.status === UserStatuses.DISABLED) {
			throw new HTTPError({
				httpStatus: StatusCodes.BAD_REQUEST,
				message: "The administrator cannot be disabled",
			});
		}

		const updated = await this.users.update(user.id, { status: this.data.status });
		return toPublicUser(updated ?? user);
	}
}

export default SetUserStatusService;
