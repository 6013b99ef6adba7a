import type { User } from "../../db/index.ts";

export type PublicUser = Omit<User, "passwordHash">;

export const toPublicUser = ({ passwordHash: _passwordHash, ...user }: User): PublicUser =>
	user;
