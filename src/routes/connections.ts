/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * connections.ts: Connection history route for NalVault.
 */
import type { Express, Request, Response } from "express";
import type { RouteContext } from "./index.js";

// Number of events returned when no limit is given.
const DEFAULT_LIMIT = 50;

/**
 * Parses the limit query parameter.
 * @param value - The raw query value.
 * @returns A positive limit, or the default.
 */
export function parseLimit(value: unknown): number {

  const parsed = (typeof value === "string") ? parseInt(value, 10) : NaN;

  return (Number.isInteger(parsed) && (parsed > 0)) ? parsed : DEFAULT_LIMIT;
}

/**
 * Creates the connection history endpoint. Events are returned newest first.
 * @param app - The Express application.
 * @param context - The running service.
 */
export function setupConnectionsEndpoint(app: Express, context: RouteContext): void {

  app.get("/api/connections", (req: Request, res: Response): void => {

    res.json({ events: context.connectionLog.recent(parseLimit(req.query.limit)), total: context.connectionLog.size });
  });
}
