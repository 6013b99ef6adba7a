import type { LockoutState, LockoutStore } from "../../repositories/lockoutStore.ts";
import type { Clock } from "../../utils/clock.ts";
import { systemClock } from "../../utils/clock.ts";

export const LockStates = {
	OPEN: "OPEN",
	LOCKED: "LOCKED",
} as const;

export type LockStatus =
	| { state: typeof LockStates.OPEN; failedAttempts: number }
	| { state: typeof LockStates.LOCKED; lockedUntil: Date; retryAfterSeconds: number };

export interface LockoutPolicy {
	threshold: number;
	durationMs: number;
}

export const DEFAULT_LOCKOUT_POLICY: LockoutPolicy = {
	threshold: 5,
	durationMs: 15 * 60 * 1000,
};

export const normaliseIdentity = (identity: string): string =>
	identity.trim().toLowerCase();

const isLockActive = (state: LockoutState, now: Date): boolean =>
	state.lockedUntil !== null && now.getTime() < state.lockedUntil.getTime();

/**
 * Status observed at `now`. An elapsed lock reads as OPEN with no failures.
 */
export function statusAt(state: LockoutState | null, now: Date): LockStatus {
	if (!state) {
		return { state: LockStates.OPEN, failedAttempts: 0 };
	}

	if (state.lockedUntil !== null) {
		if (isLockActive(state, now)) {
			return {
				state: LockStates.LOCKED,
				lockedUntil: state.lockedUntil,
				retryAfterSeconds: Math.ceil(
					(state.lockedUntil.getTime() - now.getTime()) / 1000
				),
			};
		}
		return { state: LockStates.OPEN, failedAttempts: 0 };
	}

	return { state: LockStates.OPEN, failedAttempts: state.failedAttempts };
}

/**
 * Transition applied for one failed attempt.
 * A failure while locked leaves the lock as it is.
 */
export function nextFailureState(
	identity: string,
	current: LockoutState | null,
	now: Date,
	policy: LockoutPolicy
): LockoutState {
	if (current && isLockActive(current, now)) {
		return { ...current, lastAttemptAt: now };
	}

	const previous = current && current.lockedUntil === null ? current.failedAttempts : 0;
	const failedAttempts = previous + 1;

	return {
		identity,
		failedAttempts,
		lockedUntil:
			failedAttempts >= policy.threshold
				? new Date(now.getTime() + policy.durationMs)
				: null,
		lastAttemptAt: now,
	};
}

export interface LockoutTrackerOptions {
	store: LockoutStore;
	policy?: LockoutPolicy;
	clock?: Clock;
}

/**
 * Per-identity failed-attempt counter with a timed lockout window
 */
export class LockoutTracker {
	private readonly store: LockoutStore;
	private readonly policy: LockoutPolicy;
	private readonly clock: Clock;

	constructor({ store, policy = DEFAULT_LOCKOUT_POLICY, clock = systemClock }: LockoutTrackerOptions) {
		this.store = store;
		this.policy = policy;
		this.clock = clock;
	}

	async check(identity: string): Promise<LockStatus> {
		const state = await this.store.find(normaliseIdentity(identity));
		return statusAt(state, this.clock());
	}

	async recordFailure(identity: string): Promise<LockStatus> {
		const key = normaliseIdentity(identity);
		const now = this.clock();
		const next = await this.store.update(key, (current) =>
			nextFailureState(key, current, now, this.policy)
		);
		return statusAt(next, now);
	}

	async recordSuccess(identity: string): Promise<void> {
		await this.store.clear(normaliseIdentity(identity));
	}
}
