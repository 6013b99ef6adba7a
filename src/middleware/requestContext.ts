import type { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";

const firstHeaderValue = (value: string | string[] | undefined): string | undefined =>
	Array.isArray(value) ? value[0] : value;

/**
 * Attach request id, client IP and user agent for security events and logs
 */
export const requestContext = () => {
	return (req: Request, res: Response, next: NextFunction) => {
		req.requestId = firstHeaderValue(req.headers["x-request-id"]) || uuidv4();
		req.clientIp = getClientIp(req);
		req.clientUserAgent = req.headers["user-agent"] || "unknown";

		res.setHeader("X-Request-ID", req.requestId);

		next();
	};
};

/**
 * Get client IP address, handling proxy headers
 */
function getClientIp(req: Request): string {
	const forwardedFor = firstHeaderValue(req.headers["x-forwarded-for"]);
	if (forwardedFor) {
		// comma-separated list, client first
		return forwardedFor.split(",")[0].trim();
	}

	const realIp = firstHeaderValue(req.headers["x-real-ip"]);
	if (realIp) return realIp;

	return req.socket.remoteAddress || req.ip || "unknown";
}

export default requestContext;
