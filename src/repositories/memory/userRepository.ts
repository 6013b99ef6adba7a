import { Roles, UserStatuses } from "../../db/index.ts";
import type { User } from "../../db/index.ts";
import type {
	NewUserData,
	UserChanges,
	UserFilters,
	UserRepository,
} from "../userRepository.ts";
import { DuplicateEntryError } from "../errors.ts";
import { newestFirst } from "./ordering.ts";

const copyOrNull = (user: User | undefined): User | null => (user ? { ...user } : null);

export class MemoryUserRepository implements UserRepository {
	private readonly users = new Map<number, User>();
	private nextId = 1;

	async findById(id: number): Promise<User | null> {
		return copyOrNull(this.users.get(id));
	}

	async findByUsername(username: string): Promise<User | null> {
		return copyOrNull(this.find((user) => user.username === username));
	}

	async findByEmail(email: string): Promise<User | null> {
		return copyOrNull(this.find((user) => user.email === email));
	}

	async list({ search, role, status }: UserFilters): Promise<User[]> {
		const needle = search?.toLowerCase();
		return [...this.users.values()]
			.filter(
				(user) =>
					!needle ||
					user.username.toLowerCase().includes(needle) ||
					user.fullName.toLowerCase().includes(needle) ||
					user.email.toLowerCase().includes(needle)
			)
			.filter((user) => !role || user.role === role)
			.filter((user) => !status || user.status === status)
			.sort(newestFirst)
			.map((user) => ({ ...user }));
	}

	async create(data: NewUserData): Promise<User> {
		// Checked without yielding, like the unique indexes of the users table
		if (this.find((user) => user.username === data.username)) {
			throw new DuplicateEntryError("username", data.username);
		}
		if (this.find((user) => user.email === data.email)) {
			throw new DuplicateEntryError("email", data.email);
		}

		const now = new Date();
		const user: User = {
			id: this.nextId++,
			username: data.username,
			email: data.email,
			fullName: data.fullName,
			passwordHash: data.passwordHash,
			role: data.role ?? Roles.USER,
			status: data.status ?? UserStatuses.ACTIVE,
			createdAt: now,
			updatedAt: now,
			lastLoginAt: null,
		};
		this.users.set(user.id, user);
		return { ...user };
	}

	async update(id: number, changes: UserChanges): Promise<User | null> {
		const existing = this.users.get(id);
		if (!existing) return null;
		const { email } = changes;
		if (email !== undefined && this.find((user) => user.email === email && user.id !== id)) {
			throw new DuplicateEntryError("email", email);
		}

		const updated: User = { ...existing, ...changes, updatedAt: new Date() };
		this.users.set(id, updated);
		return { ...updated };
	}

	private find(predicate: (user: User) => boolean): User | undefined {
		return [...this.users.values()].find(predicate);
	}

	async count(filters: Pick<UserFilters, "status"> = {}): Promise<number> {
		return [...this.users.values()].filter(
			(user) => !filters.status || user.status === filters.status
		).length;
	}
}
