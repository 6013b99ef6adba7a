import { StatusCodes } from "http-status-codes";
import { HTTPError } from "../config/error.ts";

/**
 * One unit of domain work behind a route.
 *
 * Request shape is checked by the route's zod schema before the service is
 * built; `validate` covers rules that depend on several fields together and
 * answers 422 with the returned message. `handle` raises `HTTPError` for
 * conflicts and missing entities.
 */
abstract class Service<Data, Result> {
	readonly data: Data;

	constructor(data: Data) {
		this.data = data;
	}

	async validate(): Promise<string | undefined> {
		return undefined;
	}

	abstract handle(): Promise<Result>;

	async execute(): Promise<Result> {
		const validationError = await this.validate();
		if (validationError) {
			throw new HTTPError({
				httpStatus: StatusCodes.UNPROCESSABLE_ENTITY,
				message: validationError,
			});
		}
		return this.handle();
	}
}

export { Service };
