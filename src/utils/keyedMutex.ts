/**
 * Serialises async work per key; different keys run concurrently.
 * Tasks for one key run in arrival order.
 */
export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>();

	async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const current = previous.then(task);
		const tail = current.then(
			() => undefined,
			() => undefined
		);
		this.tails.set(key, tail);

		try {
			return await current;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	get pendingKeys(): number {
		return this.tails.size;
	}
}
