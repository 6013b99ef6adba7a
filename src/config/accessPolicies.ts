/**
 * Access policies for protected endpoints
 * Each route group declares the role it requires and how that role is matched
 */

import { Roles } from "../db/schema/users.ts";
import type { Role } from "../db/schema/users.ts";

export const RoleMatches = {
	EXACT: "exact", // token role must equal the required role
	HIERARCHY: "hierarchy", // token role must rank at or above the required role
} as const;

export type RoleMatch = (typeof RoleMatches)[keyof typeof RoleMatches];

export interface AccessPolicy {
	role: Role;
	match: RoleMatch;
}

export const RoleRanks: Record<Role, number> = {
	[Roles.USER]: 1,
	[Roles.ADMIN]: 2,
};

export const AccessPolicies = {
	// ============================================
	// Articles
	// ============================================
	ARTICLES_READ: { role: Roles.USER, match: RoleMatches.HIERARCHY },
	ARTICLES_WRITE: { role: Roles.ADMIN, match: RoleMatches.EXACT },

	// ============================================
	// Reports
	// ============================================
	REPORTS_OWN: { role: Roles.USER, match: RoleMatches.HIERARCHY },
	REPORTS_MANAGE: { role: Roles.ADMIN, match: RoleMatches.EXACT },

	// ============================================
	// Users & security
	// ============================================
	USERS_MANAGE: { role: Roles.ADMIN, match: RoleMatches.EXACT },
	SECURITY_EVENTS_READ: { role: Roles.ADMIN, match: RoleMatches.EXACT },

	// ============================================
	// Session
	// ============================================
	SESSION: { role: Roles.USER, match: RoleMatches.HIERARCHY },
} as const satisfies Record<string, AccessPolicy>;

export type AccessPolicyName = keyof typeof AccessPolicies;

export function satisfiesPolicy(role: Role, policy: AccessPolicy): boolean {
	if (policy.match === RoleMatches.EXACT) {
		return role === policy.role;
	}
	return RoleRanks[role] >= RoleRanks[policy.role];
}
