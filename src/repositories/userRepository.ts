import type { Role, User, UserStatus } from "../db/index.ts";

export interface UserFilters {
	search?: string;
	role?: Role;
	status?: UserStatus;
}

export interface NewUserData {
	username: string;
	email: string;
	fullName: string;
	passwordHash: string;
	role?: Role;
	status?: UserStatus;
}

export type UserChanges = Partial<
	Pick<User, "email" | "fullName" | "passwordHash" | "role" | "status" | "lastLoginAt">
>;

/**
 * Credential store: user accounts with hashed passwords, roles and status
 */
export interface UserRepository {
	findById(id: number): Promise<User | null>;
	findByUsername(username: string): Promise<User | null>;
	findByEmail(email: string): Promise<User | null>;
	/** Newest first */
	list(filters: UserFilters): Promise<User[]>;
	create(data: NewUserData): Promise<User>;
	update(id: number, changes: UserChanges): Promise<User | null>;
	count(filters?: Pick<UserFilters, "status">): Promise<number>;
}
