/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * recording.ts: Recording session control routes for NalVault.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatError } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import type { RouteContext } from "./index.js";

/* Session control. Starting answers once recorders are starting for every connected source. Stopping answers 202 right away: draining recorders and the final
 * consolidation pass can take a while, and GET /api/recording reports draining until they finish.
 */

/**
 * Reads the optional session name from a start request body.
 * @param body - The parsed request body.
 * @returns The name (undefined when absent), or null when the body is malformed.
 */
export function parseSessionName(body: unknown): Nullable<string | undefined> {

  if((body === undefined) || (body === null) || (typeof body !== "object")) {

    return undefined;
  }

  const value = ("sessionName" in body) ? body.sessionName : undefined;

  if((value === undefined) || (value === null)) {

    return undefined;
  }

  if(typeof value !== "string") {

    return null;
  }

  const trimmed = value.trim();

  return (trimmed.length > 0) ? trimmed : undefined;
}

/**
 * Creates the recording endpoints.
 * @param app - The Express application.
 * @param context - The running service.
 */
export function setupRecordingEndpoints(app: Express, context: RouteContext): void {

  const { session } = context;

  app.get("/api/recording", (_req: Request, res: Response): void => {

    res.json(session.status);
  });

  app.post("/api/recording/start", async (req: Request, res: Response): Promise<void> => {

    const sessionName = parseSessionName(req.body);

    if(sessionName === null) {

      res.status(400).json({ error: "sessionName must be a string." });

      return;
    }

    try {

      const info = await session.start(sessionName);

      res.json({ directory: info.directory, name: info.name, startedAt: info.startedAt.toISOString() });
    } catch(error) {

      LOG.error("Unable to start a recording session: %s.", formatError(error));

      res.status(500).json({ error: formatError(error) });
    }
  });

  app.post("/api/recording/stop", (_req: Request, res: Response): void => {

    const wasRecording = session.isRecording;

    session.stop().catch((error: unknown) => {

      LOG.error("Recording session did not stop cleanly: %s.", formatError(error));
    });

    res.status(202).json({ draining: session.isDraining, stopped: wasRecording });
  });

  app.post("/api/recording/consolidate", async (_req: Request, res: Response): Promise<void> => {

    if(!session.isRecording) {

      res.status(409).json({ error: "No recording session is active." });

      return;
    }

    res.json({ sources: await session.consolidateNow() });
  });
}
