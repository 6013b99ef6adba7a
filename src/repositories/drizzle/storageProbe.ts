import { sql } from "drizzle-orm";

import type { Database } from "../../config/database.ts";
import type { StorageProbe } from "../storageProbe.ts";

export class DrizzleStorageProbe implements StorageProbe {
	readonly driver = "postgres";

	constructor(private readonly db: Database) {}

	async ping(): Promise<void> {
		await this.db.execute(sql`select 1`);
	}
}
