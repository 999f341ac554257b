/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sources.ts: Source listing and live preview routes for NalVault.
 */
import type { Express, Request, Response } from "express";
import type { Nullable } from "../types/index.js";
import type { RouteContext } from "./index.js";

/**
 * Parses a 1-based slot index from a route parameter.
 * @param value - The raw parameter.
 * @returns The index, or null if it is not a positive integer.
 */
export function parseSlotIndex(value: string): Nullable<number> {

  return /^[1-9]\d*$/.test(value) ? Number(value) : null;
}

/**
 * Creates the source endpoints.
 * @param app - The Express application.
 * @param context - The running service.
 */
export function setupSourcesEndpoints(app: Express, context: RouteContext): void {

  const { registry, session } = context;

  app.get("/api/sources", (_req: Request, res: Response): void => {

    res.json({ sources: registry.summaries(session) });
  });

  // The most recent decoded picture for a slot. Clients poll this; it is never cached.
  app.get("/api/sources/:slot/preview.jpg", (req: Request, res: Response): void => {

    const index = parseSlotIndex(req.params.slot);

    if((index === null) || !registry.get(index)) {

      res.status(404).json({ error: "No such slot." });

      return;
    }

    const frame = registry.decoderFor(index)?.latestFrame;

    if(!frame) {

      res.status(404).json({ error: "No preview frame is available for this slot." });

      return;
    }

    res.setHeader("Cache-Control", "no-store");
    res.type("image/jpeg").send(frame.jpeg);
  });
}
