import type { AdminSeed } from "../../config/env.ts";
import { Roles, UserStatuses } from "../../db/index.ts";
import type { UserRepository } from "../../repositories/userRepository.ts";
import type { PasswordHasher } from "../../utils/hashingTools.ts";
import { logger } from "../../utils/logger.ts";
import { toPublicUser } from "./publicUser.ts";
import type { PublicUser } from "./publicUser.ts";

export interface SeedAdminResult {
	created: boolean;
	user: PublicUser;
}

/**
 * Ensure the administrator account exists. An existing account is left untouched.
 */
export async function seedAdmin(
	users: UserRepository,
	hasher: PasswordHasher,
	seed: AdminSeed
): Promise<SeedAdminResult> {
	const username = seed.username.trim().toLowerCase();

	const existing = await users.findByUsername(username);
	if (existing) {
		logger.info("Administrator already exists", { username });
		return { created: false, user: toPublicUser(existing) };
	}

	const user = await users.create({
		username,
		email: seed.email.trim().toLowerCase(),
		fullName: "Administrator",
		passwordHash: await hasher.hash(seed.password),
		role: Roles.ADMIN,
		status: UserStatuses.ACTIVE,
	});
	logger.info("Administrator created", { username, id: user.id });

	return { created: true, user: toPublicUser(user) };
}
