import z from "zod";

export const getNumberValidationSchema = (valueName: string) =>
	z.number({
		coerce: true,
		required_error: `${valueName} is required`,
		invalid_type_error: `${valueName} should be number`,
	});

export const getIdValidationSchema = (valueName: string) =>
	getNumberValidationSchema(valueName)
		.int(`${valueName} should be an integer`)
		.positive(`${valueName} should be positive`);

export const getStringValidationSchema = (valueName: string) =>
	z
		.string({
			required_error: `${valueName} is required`,
			invalid_type_error: `${valueName} should be string`,
		})
		.min(1, `${valueName} is required`);

export const emailValidationSchema = getStringValidationSchema("Email").email({
	message: "Email is invalid",
});

interface GetMinMaxValidationSchemaData {
	valueName: string;
	min?: number;
	max?: number;
}

export const getMinMaxValidationSchema = ({
	min,
	max,
	valueName,
}: GetMinMaxValidationSchemaData) => {
	let schema = getStringValidationSchema(valueName).trim();
	if (min)
		schema = schema.min(min, {
			message: `${valueName} cannot have less than ${min} characters.`,
		});
	if (max)
		schema = schema.max(max, {
			message: `${valueName} cannot have more than ${max} characters.`,
		});
	return schema;
};

const BCRYPT_MAX_PASSWORD_BYTES = 72;

// Untrimmed: the stored hash must match what the user types at login.
export const passwordValidationSchema = getStringValidationSchema("Password")
	.min(8, { message: "Password cannot have less than 8 characters." })
	.max(BCRYPT_MAX_PASSWORD_BYTES, {
		message: `Password cannot have more than ${BCRYPT_MAX_PASSWORD_BYTES} characters.`,
	})
	.refine((password) => Buffer.byteLength(password, "utf8") <= BCRYPT_MAX_PASSWORD_BYTES, {
		message: `Password cannot be longer than ${BCRYPT_MAX_PASSWORD_BYTES} bytes.`,
	});

export const isoDateValidationSchema = (valueName: string) =>
	getStringValidationSchema(valueName).regex(/^\d{4}-\d{2}-\d{2}$/, {
		message: `${valueName} must use the YYYY-MM-DD format`,
	});

export const idParamsSchema = z.object({
	id: getIdValidationSchema("id"),
});
