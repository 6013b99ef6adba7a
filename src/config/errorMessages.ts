enum ErrorMessages {
	USERNAME_PASSWORD_INCORRECT = "Invalid credentials. Please check your username and password.",
	ACCOUNT_LOCKED = "Account temporarily locked due to too many failed login attempts.",
	ACCOUNT_DISABLED = "Your account has been disabled. Please contact an administrator.",
	AUTHENTICATION_REQUIRED = "Authentication required.",
	TOKEN_EXPIRED = "Session expired. Please log in again.",
	TOKEN_INVALID = "Invalid token.",
	INSUFFICIENT_ROLE = "You do not have permission to perform this action.",
	USER_NOT_FOUND = "User not found.",
	ARTICLE_NOT_FOUND = "Article not found.",
	REPORT_NOT_FOUND = "Report not found.",
}

export default ErrorMessages;
