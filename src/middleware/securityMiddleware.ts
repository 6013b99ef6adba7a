/**
 * Security Middleware
 * Rate limiting, parameter pollution protection and security headers
 */

import type { CorsOptions } from "cors";
import type { RequestHandler } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import hpp from "hpp";

import type { AppConfig } from "../config/env.ts";

export interface SecurityMiddlewares {
	headers: RequestHandler;
	parameterPollution: RequestHandler;
	rateLimiter: RequestHandler;
	cors: CorsOptions;
}

export function createSecurityMiddlewares({
	env,
	http,
}: Pick<AppConfig, "env" | "http">): SecurityMiddlewares {
	// General API rate limit, per client IP
	const rateLimiter = rateLimit({
		windowMs: http.rateLimitWindowMs,
		limit: http.rateLimitMax,
		message: {
			error: "Too many requests",
			code: "RATE_LIMIT_EXCEEDED",
			retryAfter: Math.ceil(http.rateLimitWindowMs / 1000),
		},
		standardHeaders: true,
		legacyHeaders: false,
		keyGenerator: (req) => req.clientIp || req.ip || "unknown",
	});

	const headers = helmet({
		contentSecurityPolicy: {
			directives: {
				defaultSrc: ["'self'"],
				scriptSrc: ["'self'"],
			},
		},
		crossOriginResourcePolicy: { policy: "cross-origin" },
	});

	const allowedOrigins = http.corsAllowedOrigins;
	const cors: CorsOptions = {
		origin(requestOrigin, callback) {
			if (!requestOrigin || env !== "production") {
				return callback(null, true);
			}
			callback(null, allowedOrigins.includes("*") || allowedOrigins.includes(requestOrigin));
		},
		methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
		allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
		optionsSuccessStatus: 204,
	};

	return {
		headers,
		parameterPollution: hpp(),
		rateLimiter,
		cors,
	};
}
