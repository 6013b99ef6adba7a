import { eq } from "drizzle-orm";

import type { Database } from "../../config/database.ts";
import { loginAttempts } from "../../db/index.ts";
import type { LoginAttempt } from "../../db/index.ts";
import type { LockoutState, LockoutStore, LockoutUpdater } from "../lockoutStore.ts";

const toState = (row: LoginAttempt): LockoutState => ({
	identity: row.identifier,
	failedAttempts: row.attempts,
	lockedUntil: row.lockedUntil,
	lastAttemptAt: row.lastAttemptAt,
});

export class DrizzleLockoutStore implements LockoutStore {
	constructor(private readonly db: Database) {}

	async find(identity: string): Promise<LockoutState | null> {
		const [row] = await this.db
			.select()
			.from(loginAttempts)
			.where(eq(loginAttempts.identifier, identity))
			.limit(1);
		return row ? toState(row) : null;
	}

	/**
	 * Ensures the row exists, then locks it FOR UPDATE so concurrent
	 * updates for the same identity queue behind this transaction.
	 */
	async update(identity: string, updater: LockoutUpdater): Promise<LockoutState> {
		return this.db.transaction(async (tx) => {
			await tx
				.insert(loginAttempts)
				.values({ identifier: identity, attempts: 0 })
				.onConflictDoNothing({ target: loginAttempts.identifier });

			const [row] = await tx
				.select()
				.from(loginAttempts)
				.where(eq(loginAttempts.identifier, identity))
				.for("update")
				.limit(1);

			if (!row) {
				throw new Error(`Lockout row for ${identity} vanished inside its transaction`);
			}

			const current = row.attempts > 0 || row.lockedUntil ? toState(row) : null;
			const next = updater(current);

			await tx
				.update(loginAttempts)
				.set({
					attempts: next.failedAttempts,
					lockedUntil: next.lockedUntil,
					lastAttemptAt: next.lastAttemptAt,
				})
				.where(eq(loginAttempts.id, row.id));

			return next;
		});
	}

	async clear(identity: string): Promise<void> {
		await this.db.delete(loginAttempts).where(eq(loginAttempts.identifier, identity));
	}
}
