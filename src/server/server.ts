import type { Server as HTTPServer } from "node:http";

import cors from "cors";
import express, { response } from "express";
import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { getReasonPhrase, ReasonPhrases, StatusCodes } from "http-status-codes";
import morgan from "morgan";

import { HTTPError } from "../config/error.ts";
import requestContext from "../middleware/requestContext.ts";
import type { SecurityMiddlewares } from "../middleware/securityMiddleware.ts";
import { logger } from "../utils/logger.ts";

export interface Route {
	path: string;
	handlers: RequestHandler[];
}

interface ServerInitData {
	name: string;
	routes: Route[];
	security: SecurityMiddlewares;
	accessLog?: boolean;
}

// express.json() raises this for unparsable bodies
const isBodyParseError = (err: Error): boolean =>
	err instanceof SyntaxError && "body" in err;

export default class Server {
	app: Express;
	name: string;
	routes: Route[];
	private readonly log = logger.child({ component: "server" });

	constructor({ name, routes, security, accessLog = true }: ServerInitData) {
		const app = express();
		this.app = app;
		this.name = name;
		this.routes = routes;
		this.setupPreRoutesMiddlewares(security, accessLog);
		this.setupRoutes();
		this.setupPostRoutesMiddlewares();
	}

	setupPreRoutesMiddlewares(security: SecurityMiddlewares, accessLog: boolean) {
		this.app.disable("x-powered-by");

		// Security headers & CORS
		this.app.use(security.headers);
		this.app.use(cors(security.cors));

		// JSON parser
		this.app.use(express.json());

		// HTTP parameter pollution
		this.app.use(security.parameterPollution);

		// Request context (IP, user agent, request ID)
		this.app.use(requestContext());

		// Rate limiting, keyed on the client IP resolved above
		this.app.use(security.rateLimiter);

		// Request logging
		if (accessLog) {
			this.app.use(
				morgan(":remote-addr :method :url HTTP/:http-version :status - :response-time ms", {
					stream: { write: (line) => this.log.info(line.trim()) },
				})
			);
		}

		// Response wrapper middleware
		this.app.use((_req, res, next) => {
			const actualSendMethod = res.send;
			res.send = (data) => {
				let payload: unknown;
				try {
					payload = typeof data === "string" ? JSON.parse(data) : data;
				} catch {
					payload = data;
				}
				const statusCode = res.statusCode;
				res.send = actualSendMethod;
				return res.status(statusCode).json({
					status: statusCode,
					message: getReasonPhrase(statusCode),
					payload,
				});
			};
			next();
		});
	}

	setupRoutes() {
		for (const route of this.routes) {
			this.app.use(route.path, ...route.handlers);
		}
	}

	setupPostRoutesMiddlewares() {
		// 404 handler
		this.app.use((_req, _res, next) => {
			next(new HTTPError({ httpStatus: StatusCodes.NOT_FOUND }));
		});

		// Error handler
		this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
			res.send = response.send;

			const httpError = isBodyParseError(err)
				? new HTTPError({
						httpStatus: StatusCodes.BAD_REQUEST,
						message: "Malformed JSON body",
					})
				: err;

			if (httpError instanceof HTTPError) {
				res.set(httpError.headers);
				return res.status(httpError.httpStatus).json({
					status: httpError.httpStatus,
					error: httpError.message || getReasonPhrase(httpError.httpStatus),
					reason: httpError.reason || null,
				});
			}

			this.log.error("Unhandled error", err, {
				method: req.method,
				url: req.originalUrl,
				requestId: req.requestId,
			});
			return res.status(StatusCodes.INTERNAL_SERVER_ERROR).json({
				status: StatusCodes.INTERNAL_SERVER_ERROR,
				error: ReasonPhrases.INTERNAL_SERVER_ERROR,
			});
		});
	}

	/**
	 * Listen on `port` (0 picks a free one). Resolves once the socket is bound.
	 */
	start(port: number, host = "0.0.0.0"): Promise<HTTPServer> {
		return new Promise((resolve, reject) => {
			const server = this.app.listen(port, host);

			server.once("listening", () => {
				this.log.info(`Server ${this.name} is running`, { host, port: this.portOf(server, port) });
				resolve(server);
			});

			server.once("error", (err: NodeJS.ErrnoException) => {
				if (err.code === "EADDRINUSE") {
					this.log.error(`Port ${port} is already in use`, err);
				} else {
					this.log.error("Server error", err);
				}
				reject(err);
			});
		});
	}

	private portOf(server: HTTPServer, fallback: number): number {
		const address = server.address();
		return address && typeof address === "object" ? address.port : fallback;
	}
}
