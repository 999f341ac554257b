/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for NalVault.
 */
import type { Express, Request, Response } from "express";
import type { HealthStatus } from "../types/index.js";
import type { RouteContext } from "./index.js";
import { getPackageVersion } from "../utils/index.js";

/* The health endpoint reports process metrics, slot occupancy and recording state for monitoring systems. Recording never depends on ffmpeg, so a missing ffmpeg
 * with preview enabled only degrades the status; the endpoint always answers 200 while the process is up.
 */

/**
 * Builds the health report.
 * @param context - The running service.
 * @returns The health status.
 */
export function buildHealthStatus(context: RouteContext): HealthStatus {

  const memoryUsage = process.memoryUsage();
  const { registry, session } = context;
  const sessionStatus = session.status;

  return {

    ffmpegAvailable: context.ffmpegAvailable,
    memory: {

      heapTotal: memoryUsage.heapTotal,
      heapUsed: memoryUsage.heapUsed,
      rss: memoryUsage.rss
    },
    recording: {

      active: sessionStatus.active,
      draining: sessionStatus.draining,
      recordingSources: sessionStatus.recordingSources
    },
    slots: {

      occupied: registry.occupiedCount,
      total: registry.slots.length
    },
    status: (context.config.preview.enabled && !context.ffmpegAvailable) ? "degraded" : "healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    version: getPackageVersion()
  };
}

/**
 * Creates the health check endpoint.
 * @param app - The Express application.
 * @param context - The running service.
 */
export function setupHealthEndpoint(app: Express, context: RouteContext): void {

  app.get("/health", (_req: Request, res: Response): void => {

    res.json(buildHealthStatus(context));
  });
}
