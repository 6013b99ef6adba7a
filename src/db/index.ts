// ============================================
// Core Tables
// ============================================

// Users
export {
	users,
	rolesEnum,
	Roles,
	userStatusEnum,
	UserStatuses,
} from "./schema/users.ts";
export type { User, NewUser, Role, UserStatus } from "./schema/users.ts";

// ============================================
// Auth Tables
// ============================================

// Login Attempts (lockout)
export { loginAttempts } from "./schema/loginAttempts.ts";
export type { LoginAttempt, NewLoginAttempt } from "./schema/loginAttempts.ts";

// Security Events (append-only audit of authentication outcomes)
export {
	securityEvents,
	securityEventKindEnum,
	SecurityEventKinds,
} from "./schema/securityEvents.ts";
export type {
	SecurityEvent,
	NewSecurityEvent,
	SecurityEventKind,
} from "./schema/securityEvents.ts";

// ============================================
// Inventory Tables
// ============================================

// Articles
export {
	articles,
	DEFAULT_ARTICLE_UNIT,
	DEFAULT_ARTICLE_STATUS,
} from "./schema/articles.ts";
export type { Article, NewArticle } from "./schema/articles.ts";

// Reports
export {
	reports,
	reportTypeEnum,
	ReportTypes,
	reportStatusEnum,
	ReportStatuses,
} from "./schema/reports.ts";
export type {
	Report,
	NewReport,
	ReportType,
	ReportStatus,
} from "./schema/reports.ts";
