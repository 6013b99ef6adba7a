import type { LockoutState, LockoutStore, LockoutUpdater } from "../lockoutStore.ts";

/**
 * Map-backed lockout store. `update` reads and writes without awaiting in
 * between, so it is atomic on the event loop.
 */
export class MemoryLockoutStore implements LockoutStore {
	private readonly states = new Map<string, LockoutState>();

	async find(identity: string): Promise<LockoutState | null> {
		const state = this.states.get(identity);
		return state ? { ...state } : null;
	}

	async update(identity: string, updater: LockoutUpdater): Promise<LockoutState> {
		const current = this.states.get(identity);
		const next = updater(current ? { ...current } : null);
		this.states.set(identity, { ...next });
		return { ...next };
	}

	async clear(identity: string): Promise<void> {
		this.states.delete(identity);
	}
}
