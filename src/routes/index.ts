/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for NalVault.
 */
import type { Config } from "../types/index.js";
import type { ConnectionLog } from "../ingest/connectionLog.js";
import type { Express } from "express";
import type { RecordingSession } from "../recording/session.js";
import type { SlotRegistry } from "../ingest/registry.js";
import { setupConnectionsEndpoint } from "./connections.js";
import { setupHealthEndpoint } from "./health.js";
import { setupLogsEndpoint } from "./logs.js";
import { setupRecordingEndpoints } from "./recording.js";
import { setupSourcesEndpoints } from "./sources.js";

/*
 * ROUTE SETUP
 *
 * This module aggregates all route setup functions and provides a single function to configure all HTTP endpoints on the Express application. Every route reads the
 * service's state through the RouteContext built at startup.
 */

/**
 * The running service, as seen by the HTTP routes.
 */
export interface RouteContext {

  config: Config;
  connectionLog: ConnectionLog;

  // True if ffmpeg was found at startup.
  ffmpegAvailable: boolean;

  registry: SlotRegistry;
  session: RecordingSession;
}

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param context - The running service.
 */
export function setupRoutes(app: Express, context: RouteContext): void {

  setupConnectionsEndpoint(app, context);
  setupHealthEndpoint(app, context);
  setupLogsEndpoint(app, context);
  setupRecordingEndpoints(app, context);
  setupSourcesEndpoints(app, context);
}
