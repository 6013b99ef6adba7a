import "express";

import type { Principal } from "../src/services/auth/types.ts";

declare global {
	namespace Express {
		interface Request {
			// Auth
			principal?: Principal;

			// Request context
			requestId?: string;
			clientIp?: string;
			clientUserAgent?: string;
		}
	}
}
