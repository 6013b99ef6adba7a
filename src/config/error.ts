import { StatusCodes } from "http-status-codes";

interface HTTPErrorData {
	httpStatus: StatusCodes;
	message?: string;
	reason?: object | string;
	headers?: Record<string, string>;
}

export class HTTPError extends Error {
	httpStatus: StatusCodes;
	reason?: object | string;
	headers: Record<string, string>;

	constructor({ httpStatus, message, reason, headers = {} }: HTTPErrorData) {
		super(message);
		this.name = "HTTPError";
		this.httpStatus = httpStatus;
		this.reason = reason;
		this.headers = headers;
	}
}
