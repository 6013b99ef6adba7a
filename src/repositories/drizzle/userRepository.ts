import { and, count, desc, eq, ilike, or } from "drizzle-orm";
import type { SQL } from "drizzle-orm";

import type { Database } from "../../config/database.ts";
import { users } from "../../db/index.ts";
import type { User } from "../../db/index.ts";
import type {
	NewUserData,
	UserChanges,
	UserFilters,
	UserRepository,
} from "../userRepository.ts";
import { withUniqueGuard } from "./uniqueViolation.ts";

export class DrizzleUserRepository implements UserRepository {
	constructor(private readonly db: Database) {}

	async findById(id: number): Promise<User | null> {
		const [user] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
		return user ?? null;
	}

	async findByUsername(username: string): Promise<User | null> {
		const [user] = await this.db
			.select()
			.from(users)
			.where(eq(users.username, username))
			.limit(1);
		return user ?? null;
	}

	async findByEmail(email: string): Promise<User | null> {
		const [user] = await this.db
			.select()
			.from(users)
			.where(eq(users.email, email))
			.limit(1);
		return user ?? null;
	}

	async list({ search, role, status }: UserFilters): Promise<User[]> {
		const conditions: SQL[] = [];

		if (search) {
			const pattern = `%${search}%`;
			const matches = or(
				ilike(users.username, pattern),
				ilike(users.fullName, pattern),
				ilike(users.email, pattern)
			);
			if (matches) conditions.push(matches);
		}
		if (role) {
			conditions.push(eq(users.role, role));
		}
		if (status) {
			conditions.push(eq(users.status, status));
		}

		return this.db
			.select()
			.from(users)
			.where(and(...conditions))
			.orderBy(desc(users.createdAt), desc(users.id));
	}

	async create(data: NewUserData): Promise<User> {
		const [user] = await withUniqueGuard({ username: data.username, email: data.email }, () =>
			this.db.insert(users).values(data).returning()
		);
		return user;
	}

	async update(id: number, changes: UserChanges): Promise<User | null> {
		const [user] = await withUniqueGuard({ email: changes.email }, () =>
			this.db
				.update(users)
				.set({ ...changes, updatedAt: new Date() })
				.where(eq(users.id, id))
				.returning()
		);
		return user ?? null;
	}

	async count(filters: Pick<UserFilters, "status"> = {}): Promise<number> {
		const [row] = await this.db
			.select({ value: count() })
			.from(users)
			.where(filters.status ? eq(users.status, filters.status) : undefined);
		return row?.value ?? 0;
	}
}
