export interface LockoutState {
	identity: string;
	failedAttempts: number;
	lockedUntil: Date | null;
	lastAttemptAt: Date;
}

export type LockoutUpdater = (current: LockoutState | null) => LockoutState;

/**
 * Per-identity lockout state.
 * `update` must apply the updater atomically for the identity: no other
 * update for the same identity may interleave between its read and write.
 */
export interface LockoutStore {
	find(identity: string): Promise<LockoutState | null>;
	update(identity: string, updater: LockoutUpdater): Promise<LockoutState>;
	clear(identity: string): Promise<void>;
}
