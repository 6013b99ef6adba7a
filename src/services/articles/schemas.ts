import { z } from "zod";

import { getMinMaxValidationSchema, isoDateValidationSchema } from "../../config/zodSchemas.ts";

const stockSchema = (valueName: string) =>
	z
		.number({ invalid_type_error: `${valueName} should be number` })
		.int(`${valueName} should be an integer`)
		.nonnegative(`${valueName} cannot be negative`);

const optionalText = z.string().nullish();

export const CreateArticleDataSchema = z.object({
	code: getMinMaxValidationSchema({ valueName: "Code", min: 3, max: 50 }),
	name: getMinMaxValidationSchema({ valueName: "Name", min: 3, max: 200 }),
	description: optionalText,
	type: optionalText,
	category: optionalText,
	unit: optionalText,
	stockMin: stockSchema("Minimum stock").default(0),
	stockCurrent: stockSchema("Current stock").default(0),
	location: optionalText,
	status: getMinMaxValidationSchema({ valueName: "Status", max: 50 }).optional(),
	acquisitionDate: isoDateValidationSchema("Acquisition date").nullish(),
	observations: optionalText,
});

export type CreateArticleData = z.infer<typeof CreateArticleDataSchema>;

// The code identifies the article and cannot change
export const UpdateArticleBodySchema = CreateArticleDataSchema.omit({ code: true })
	.extend({
		stockMin: stockSchema("Minimum stock"),
		stockCurrent: stockSchema("Current stock"),
	})
	.partial();

export type UpdateArticleBody = z.infer<typeof UpdateArticleBodySchema>;
