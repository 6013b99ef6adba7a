export interface StorageProbe {
	driver: string;
	/** Resolves when the backing store answers, rejects otherwise */
	ping(): Promise<void>;
}
