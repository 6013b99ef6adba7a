import postgres from "postgres";

import { DuplicateEntryError } from "../errors.ts";
import type { DuplicateField } from "../errors.ts";

const UNIQUE_VIOLATION = "23505";

const CONSTRAINT_FIELDS: Partial<Record<string, DuplicateField>> = {
	idx_users_username: "username",
	idx_users_email: "email",
	idx_articles_code: "code",
};

/**
 * Runs a write and turns a unique-index violation on a known column into
 * `DuplicateEntryError`. `values` supplies the offending value for the message.
 */
export async function withUniqueGuard<T>(
	values: Partial<Record<DuplicateField, string>>,
	write: () => Promise<T>
): Promise<T> {
	try {
		return await write();
	} catch (error) {
		if (error instanceof postgres.PostgresError && error.code === UNIQUE_VIOLATION) {
			const field = CONSTRAINT_FIELDS[error.constraint_name ?? ""];
			if (field) {
				throw new DuplicateEntryError(field, values[field] ?? "");
			}
		}
		throw error;
	}
}
