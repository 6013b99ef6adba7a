import { StatusCodes } from "http-status-codes";

import { HTTPError } from "../../config/error.ts";
import ErrorMessages from "../../config/errorMessages.ts";
import { TokenFailureReasons } from "../../utils/jwt.ts";
import type { TokenFailureReason } from "../../utils/jwt.ts";
import { AuthFailureCodes } from "./types.ts";
import type { AuthFailure } from "./types.ts";

const tokenFailureMessage = (reason: TokenFailureReason): ErrorMessages => {
	switch (reason) {
		case TokenFailureReasons.MISSING:
			return ErrorMessages.AUTHENTICATION_REQUIRED;
		case TokenFailureReasons.EXPIRED:
			return ErrorMessages.TOKEN_EXPIRED;
		default:
			return ErrorMessages.TOKEN_INVALID;
	}
};

export function toHTTPError(failure: AuthFailure): HTTPError {
	switch (failure.code) {
		case AuthFailureCodes.INVALID_CREDENTIALS:
			return new HTTPError({
				httpStatus: StatusCodes.UNAUTHORIZED,
				message: ErrorMessages.USERNAME_PASSWORD_INCORRECT,
				reason: { code: failure.code },
			});
		case AuthFailureCodes.ACCOUNT_LOCKED:
			return new HTTPError({
				httpStatus: StatusCodes.TOO_MANY_REQUESTS,
				message: ErrorMessages.ACCOUNT_LOCKED,
				reason: {
					code: failure.code,
					retryAfterSeconds: failure.retryAfterSeconds,
					lockedUntil: failure.lockedUntil.toISOString(),
				},
				headers: { "Retry-After": String(failure.retryAfterSeconds) },
			});
		case AuthFailureCodes.ACCOUNT_DISABLED:
			return new HTTPError({
				httpStatus: StatusCodes.FORBIDDEN,
				message: ErrorMessages.ACCOUNT_DISABLED,
				reason: { code: failure.code },
			});
		case AuthFailureCodes.UNAUTHENTICATED:
			return new HTTPError({
				httpStatus: StatusCodes.UNAUTHORIZED,
				message: tokenFailureMessage(failure.reason),
				reason: { code: failure.code, token: failure.reason },
			});
		case AuthFailureCodes.FORBIDDEN:
			return new HTTPError({
				httpStatus: StatusCodes.FORBIDDEN,
				message: ErrorMessages.INSUFFICIENT_ROLE,
				reason: { code: failure.code, requiredRole: failure.requiredRole },
			});
	}
}
