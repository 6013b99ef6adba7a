import { z } from "zod";

import {
	emailValidationSchema,
	getMinMaxValidationSchema,
	passwordValidationSchema,
} from "../../config/zodSchemas.ts";
import { Roles, UserStatuses } from "../../db/index.ts";

const roleSchema = z.enum([Roles.ADMIN, Roles.USER], {
	invalid_type_error: "Role should be ADMIN or USER",
});

export const CreateUserDataSchema = z.object({
	username: getMinMaxValidationSchema({ valueName: "Username", min: 3, max: 50 }),
	email: emailValidationSchema,
	password: passwordValidationSchema,
	fullName: getMinMaxValidationSchema({ valueName: "Full name", max: 100 }),
	role: roleSchema.optional(),
});

export type CreateUserData = z.infer<typeof CreateUserDataSchema>;

export const UpdateUserBodySchema = z.object({
	email: emailValidationSchema.optional(),
	fullName: getMinMaxValidationSchema({ valueName: "Full name", max: 100 }).optional(),
	role: roleSchema.optional(),
	password: passwordValidationSchema.optional(),
});

export type UpdateUserBody = z.infer<typeof UpdateUserBodySchema>;

export const UserListQuerySchema = z.object({
	search: z.string().trim().optional(),
	role: roleSchema.optional(),
	status: z.enum([UserStatuses.ACTIVE, UserStatuses.DISABLED]).optional(),
});
