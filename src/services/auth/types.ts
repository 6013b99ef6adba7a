import type { Role } from "../../db/index.ts";
import type { TokenFailureReason } from "../../utils/jwt.ts";

export const AuthFailureCodes = {
	INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
	ACCOUNT_LOCKED: "ACCOUNT_LOCKED",
	ACCOUNT_DISABLED: "ACCOUNT_DISABLED",
	UNAUTHENTICATED: "UNAUTHENTICATED",
	FORBIDDEN: "FORBIDDEN",
} as const;

export type AuthFailure =
	| { code: typeof AuthFailureCodes.INVALID_CREDENTIALS }
	| {
			code: typeof AuthFailureCodes.ACCOUNT_LOCKED;
			lockedUntil: Date;
			retryAfterSeconds: number;
	  }
	| { code: typeof AuthFailureCodes.ACCOUNT_DISABLED }
	| { code: typeof AuthFailureCodes.UNAUTHENTICATED; reason: TokenFailureReason }
	| { code: typeof AuthFailureCodes.FORBIDDEN; requiredRole: Role };

export type AuthFailureCode = AuthFailure["code"];

/**
 * Expected authentication outcomes. Infrastructure failures are thrown instead.
 */
export type AuthResult<T> = { ok: true; value: T } | { ok: false; error: AuthFailure };

export const succeed = <T>(value: T): AuthResult<T> => ({ ok: true, value });

export const fail = <T>(error: AuthFailure): AuthResult<T> => ({ ok: false, error });

export interface Principal {
	identity: string;
	role: Role;
}
