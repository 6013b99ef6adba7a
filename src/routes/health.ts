import { Router } from "express";
import { StatusCodes } from "http-status-codes";

import { HealthStatuses } from "../services/healthService.ts";
import type { HealthService } from "../services/healthService.ts";
import expressAsyncHandler from "../utils/expressAsyncHandler.ts";

export function createHealthRouter(healthService: HealthService) {
	const healthRouter = Router();

	healthRouter.get("/", (_req, res) => {
		res.status(StatusCodes.OK).json(healthService.liveness());
	});

	healthRouter.get(
		"/db",
		expressAsyncHandler(async (_req, res) => {
			const storage = await healthService.checkStorage();
			const statistics = storage.connected ? await healthService.statistics() : null;
			return res
				.status(storage.connected ? StatusCodes.OK : StatusCodes.INTERNAL_SERVER_ERROR)
				.json({
					status: storage.connected ? "OK" : "ERROR",
					storage,
					statistics,
					timestamp: new Date().toISOString(),
				});
		})
	);

	healthRouter.get(
		"/detailed",
		expressAsyncHandler(async (_req, res) => {
			const health = await healthService.detailed();
			return res
				.status(
					health.healthStatus === HealthStatuses.HEALTHY
						? StatusCodes.OK
						: StatusCodes.SERVICE_UNAVAILABLE
				)
				.json(health);
		})
	);

	return healthRouter;
}
