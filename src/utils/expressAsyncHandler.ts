import type { NextFunction, Request, RequestHandler, Response } from "express";
import { StatusCodes } from "http-status-codes";
import type { ZodType, ZodTypeDef } from "zod";
import { HTTPError } from "../config/error.ts";

export interface ValidationOptions<T> {
	validationSchema: ZodType<T, ZodTypeDef, unknown>;
	getValue: (req: Request) => unknown;
}

type AsyncHandlerWithValidation<T> = (
	validatedData: T,
	req: Request,
	res: Response,
	next: NextFunction
) => Promise<unknown>;

type AsyncHandlerWithoutValidation = (
	req: Request,
	res: Response,
	next: NextFunction
) => Promise<unknown>;

export const parseOrThrow = <T>(
	options: ValidationOptions<T>,
	req: Request
): T => {
	const parseResult = options.validationSchema.safeParse(options.getValue(req));

	if (!parseResult.success) {
		throw new HTTPError({
			httpStatus: StatusCodes.BAD_REQUEST,
			message: "Validation failed",
			reason: parseResult.error.flatten().fieldErrors,
		});
	}

	return parseResult.data;
};

/**
 * Forward rejected handler promises to the express error handler
 */
function expressAsyncHandler(
	handler: AsyncHandlerWithoutValidation
): RequestHandler {
	return (req, res, next) => {
		handler(req, res, next).catch(next);
	};
}

/**
 * Validate a part of the request with zod before running the handler.
 * Validation failures answer 400 with the flattened field errors.
 */
export function expressValidatedHandler<T>(
	handler: AsyncHandlerWithValidation<T>,
	options: ValidationOptions<T>
): RequestHandler {
	return expressAsyncHandler(async (req, res, next) =>
		handler(parseOrThrow(options, req), req, res, next)
	);
}

export default expressAsyncHandler;
