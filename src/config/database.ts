import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export function createDatabase(connectionString: string | undefined) {
	if (!connectionString) {
		throw new Error("DATABASE_URL environment variable is not set");
	}

	const client = postgres(connectionString);
	return drizzle(client);
}

export type Database = ReturnType<typeof createDatabase>;
