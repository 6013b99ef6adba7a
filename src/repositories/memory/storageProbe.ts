import type { StorageProbe } from "../storageProbe.ts";

export class MemoryStorageProbe implements StorageProbe {
	readonly driver = "memory";

	async ping(): Promise<void> {}
}
