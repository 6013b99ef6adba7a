import { v4 as uuidv4 } from "uuid";

import type { AccessPolicy } from "../../config/accessPolicies.ts";
import { satisfiesPolicy } from "../../config/accessPolicies.ts";
import { SecurityEventKinds, UserStatuses } from "../../db/index.ts";
import type { Role } from "../../db/index.ts";
import type { UserRepository } from "../../repositories/userRepository.ts";
import type { Clock } from "../../utils/clock.ts";
import { systemClock } from "../../utils/clock.ts";
import type { PasswordHasher } from "../../utils/hashingTools.ts";
import type { TokenService } from "../../utils/jwt.ts";
import { TokenFailureReasons } from "../../utils/jwt.ts";
import { KeyedMutex } from "../../utils/keyedMutex.ts";
import type { SecurityEventContext, SecurityEventService } from "../securityEventService.ts";
import { toPublicUser } from "../users/publicUser.ts";
import type { PublicUser } from "../users/publicUser.ts";
import type { LockoutTracker } from "./lockoutTracker.ts";
import { LockStates, normaliseIdentity } from "./lockoutTracker.ts";
import { AuthFailureCodes, fail, succeed } from "./types.ts";
import type { AuthResult, Principal } from "./types.ts";

export interface LoginSuccess {
	token: string;
	role: Role;
	expiresAt: Date;
	user: PublicUser;
}

export interface AuthServiceDependencies {
	users: UserRepository;
	hasher: PasswordHasher;
	lockout: LockoutTracker;
	tokens: TokenService;
	securityEvents: SecurityEventService;
	clock?: Clock;
}

export class AuthService {
	private readonly users: UserRepository;
	private readonly hasher: PasswordHasher;
	private readonly lockout: LockoutTracker;
	private readonly tokens: TokenService;
	private readonly securityEvents: SecurityEventService;
	private readonly clock: Clock;
	private readonly mutex = new KeyedMutex();
	private dummyDigest?: Promise<string>;

	constructor({ users, hasher, lockout, tokens, securityEvents, clock = systemClock }: AuthServiceDependencies) {
		this.users = users;
		this.hasher = hasher;
		this.lockout = lockout;
		this.tokens = tokens;
		this.securityEvents = securityEvents;
		this.clock = clock;
	}

	/**
	 * Check lockout, verify the password, record the outcome and issue a token.
	 * Attempts for one identity run one at a time.
	 */
	async login(
		identity: string,
		password: string,
		context: SecurityEventContext = {}
	): Promise<AuthResult<LoginSuccess>> {
		const key = normaliseIdentity(identity);
		return this.mutex.runExclusive(key, () => this.attemptLogin(key, password, context));
	}

	async authorize(token: string | undefined, policy: AccessPolicy): Promise<AuthResult<Principal>> {
		if (!token) {
			return fail({
				code: AuthFailureCodes.UNAUTHENTICATED,
				reason: TokenFailureReasons.MISSING,
			});
		}

		const verification = await this.tokens.verify(token);
		if (!verification.ok) {
			return fail({ code: AuthFailureCodes.UNAUTHENTICATED, reason: verification.reason });
		}

		const { identity, role } = verification.token;
		if (!satisfiesPolicy(role, policy)) {
			return fail({ code: AuthFailureCodes.FORBIDDEN, requiredRole: policy.role });
		}

		return succeed({ identity, role });
	}

	private async attemptLogin(
		identity: string,
		password: string,
		context: SecurityEventContext
	): Promise<AuthResult<LoginSuccess>> {
		const status = await this.lockout.check(identity);
		if (status.state === LockStates.LOCKED) {
			await this.securityEvents.record(
				{ identity, kind: SecurityEventKinds.LOGIN_BLOCKED, outcome: AuthFailureCodes.ACCOUNT_LOCKED },
				context
			);
			return fail({
				code: AuthFailureCodes.ACCOUNT_LOCKED,
				lockedUntil: status.lockedUntil,
				retryAfterSeconds: status.retryAfterSeconds,
			});
		}

		const user = await this.users.findByUsername(identity);
		const digest = user ? user.passwordHash : await this.getDummyDigest();
		const isPasswordCorrect = await this.hasher.verify(password, digest);

		if (!user || !isPasswordCorrect) {
			const after = await this.lockout.recordFailure(identity);
			const outcome =
				after.state === LockStates.LOCKED
					? AuthFailureCodes.ACCOUNT_LOCKED
					: AuthFailureCodes.INVALID_CREDENTIALS;
			await this.securityEvents.record(
				{ identity, kind: SecurityEventKinds.LOGIN_FAILED, outcome },
				context
			);

			if (after.state === LockStates.LOCKED) {
				return fail({
					code: AuthFailureCodes.ACCOUNT_LOCKED,
					lockedUntil: after.lockedUntil,
					retryAfterSeconds: after.retryAfterSeconds,
				});
			}
			return fail({ code: AuthFailureCodes.INVALID_CREDENTIALS });
		}

		await this.lockout.recordSuccess(identity);

		if (user.status === UserStatuses.DISABLED) {
			await this.securityEvents.record(
				{ identity, kind: SecurityEventKinds.LOGIN_SUCCESS, outcome: AuthFailureCodes.ACCOUNT_DISABLED },
				context
			);
			return fail({ code: AuthFailureCodes.ACCOUNT_DISABLED });
		}

		await this.securityEvents.record(
			{ identity, kind: SecurityEventKinds.LOGIN_SUCCESS, outcome: "SUCCESS" },
			context
		);

		const updated = await this.users.update(user.id, { lastLoginAt: this.clock() });
		const issued = await this.tokens.issue(user.username, user.role);

		return succeed({
			token: issued.token,
			role: user.role,
			expiresAt: issued.expiresAt,
			user: toPublicUser(updated ?? user),
		});
	}

	// Unknown identities are verified against this digest so they cost the same as real ones
	private getDummyDigest(): Promise<string> {
		this.dummyDigest ??= this.hasher.hash(uuidv4());
		return this.dummyDigest;
	}
}
