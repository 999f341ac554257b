/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.ts: Recording session orchestration.
 */
import type { ConsolidationResult } from "./consolidation.js";
import { ConsolidationScheduler } from "./consolidation.js";
import type { Nullable, RecordingConfig } from "../types/index.js";
import { dateDirectoryName, resolveSessionName, sanitizePathComponent } from "./naming.js";
import { formatError, runWithSourceContext } from "../utils/index.js";
import { LOG } from "../utils/logger.js";
import type { MediaSink } from "../ingest/bridge.js";
import { PassthroughRecorder } from "./recorder.js";
import { join } from "node:path";
import { mkdir } from "node:fs/promises";

/* A recording session ties the recorders of every connected source to one directory tree, <root>/<yyyy-mm-dd>/<session>/. At most one session is active.
 *
 * While a session is active:
 *
 * - Every occupied slot gets a PassthroughRecorder, attached to the slot's bridge. A slot that connects later gets one too; a slot that disconnects, or whose device is
 *   replaced, has its recorder stopped and its directory consolidated one last time.
 * - A periodic timer rotates each recorder's segment and then consolidates its directory, skipping a directory whose previous pass is still running.
 *
 * Stopping clears isRecording right away and returns a promise that settles once every recorder has finalized and every consolidation has finished. Session state is
 * cleared only then, and a start() issued in the meantime waits for it.
 */

// Types.

/**
 * A source the session can record: in practice, a device slot.
 */
export interface RecordingTarget {

  // True while a device is connected.
  readonly isOccupied: boolean;

  // Source name, used for the source directory and segment file names.
  readonly serviceName: string;

  /**
   * Routes the source's media into a recorder, or stops routing when null.
   */
  attachRecorder(sink: Nullable<MediaSink>): void;
}

/**
 * Identifies an active or draining session.
 */
export interface SessionInfo {

  // <root>/<yyyy-mm-dd>/<name>.
  directory: string;

  name: string;

  startedAt: Date;
}

/**
 * Session state as reported by the API.
 */
export interface SessionStatus {

  active: boolean;
  directory: Nullable<string>;
  draining: boolean;
  name: Nullable<string>;
  recordingSources: number;
  startedAt: Nullable<string>;
}

/**
 * Result of an explicit rotate-and-consolidate pass for one source.
 */
export interface SourceConsolidation {

  error?: string;
  result?: ConsolidationResult;
  source: string;
}

/**
 * Options for creating a session manager.
 */
export interface RecordingSessionOptions {

  config: RecordingConfig;

  // Consolidation scheduler. One is created when omitted.
  scheduler?: ConsolidationScheduler;

  // Every source that may be recorded.
  targets: readonly RecordingTarget[];
}

interface ActiveRecorder {

  directory: string;

  // The source name as used in file names.
  fileName: string;

  recorder: PassthroughRecorder;
  target: RecordingTarget;
}

export class RecordingSession {

  private readonly config: RecordingConfig;
  private readonly pendingDrains = new Set<Promise<void>>();
  private readonly recorders = new Map<string, ActiveRecorder>();
  private recording = false;
  private readonly scheduler: ConsolidationScheduler;
  private session: Nullable<SessionInfo> = null;
  private startPromise: Nullable<Promise<SessionInfo>> = null;
  private stopPromise: Nullable<Promise<void>> = null;
  private readonly targets: readonly RecordingTarget[];
  private tickInFlight = false;
  private timer: Nullable<ReturnType<typeof setInterval>> = null;

  constructor(options: RecordingSessionOptions) {

    this.config = options.config;
    this.scheduler = options.scheduler ?? new ConsolidationScheduler();
    this.targets = options.targets;
  }

  /**
   * @returns True while a session is recording. False as soon as stop() is called.
   */
  public get isRecording(): boolean {

    return this.recording;
  }

  /**
   * @returns True while a stop is draining recorders and consolidation passes.
   */
  public get isDraining(): boolean {

    return this.stopPromise !== null;
  }

  /**
   * @returns The active or draining session, if any.
   */
  public get info(): Nullable<SessionInfo> {

    return this.session;
  }

  public get status(): SessionStatus {

    return {

      active: this.recording,
      directory: this.session?.directory ?? null,
      draining: this.isDraining,
      name: this.session?.name ?? null,
      recordingSources: this.recorders.size,
      startedAt: this.session?.startedAt.toISOString() ?? null
    };
  }

  /**
   * @param serviceName - A source name.
   * @returns The source's recorder while it is being recorded.
   */
  public recorderFor(serviceName: string): PassthroughRecorder | undefined {

    return this.recorders.get(serviceName)?.recorder;
  }

  /**
   * Starts a session and a recorder for every connected source. Does nothing but return the current session if one is active, and waits for a draining stop first.
   * @param sessionName - Explicit session name. Falls back to recording.sessionName, then to the next SessionNN.
   * @returns The session.
   * @throws If the session directory cannot be created.
   */
  public async start(sessionName?: string): Promise<SessionInfo> {

    if(this.recording && this.session) {

      return this.session;
    }

    this.startPromise ??= this.beginSession(sessionName).finally(() => {

      this.startPromise = null;
    });

    return this.startPromise;
  }

  /**
   * Stops the session. isRecording drops at once; recorders stop concurrently and each is followed by a final consolidation of its directory. A start still in
   * progress finishes first and the session it opens is then stopped.
   * @returns A promise that settles when everything has drained and the session state is cleared.
   */
  public stop(): Promise<void> {

    if(this.stopPromise) {

      return this.stopPromise;
    }

    if(this.startPromise) {

      return this.startPromise.then(() => this.stop(), () => this.stop());
    }

    if(!this.recording) {

      return Promise.resolve();
    }

    this.recording = false;

    if(this.timer) {

      clearInterval(this.timer);
      this.timer = null;
    }

    const name = this.session?.name ?? "";

    LOG.info("Stopping recording session %s.", name);

    this.stopPromise = this.drainSession().finally(() => {

      this.session = null;
      this.stopPromise = null;

      LOG.info("Recording session %s stopped.", name);
    });

    return this.stopPromise;
  }

  /**
   * Starts recording a source that connected during a session. Does nothing outside a session or when the source already has a recorder.
   * @param target - The source.
   */
  public async sourceConnected(target: RecordingTarget): Promise<void> {

    if(!this.recording) {

      return;
    }

    await this.startRecorder(target);
  }

  /**
   * Stops recording a source that disconnected, then consolidates its directory.
   * @param target - The source.
   */
  public async sourceDisconnected(target: RecordingTarget): Promise<void> {

    await this.trackDrain(this.stopRecorder(target.serviceName));
  }

  /**
   * Closes the recording of a replaced device and, if the session is still running, starts recording the device that replaced it.
   * @param target - The source.
   */
  public async sourceReplaced(target: RecordingTarget): Promise<void> {

    await this.sourceDisconnected(target);
    await this.sourceConnected(target);
  }

  /**
   * Rotates every recorder and consolidates its directory, queueing behind passes already running.
   * @returns Per-source results.
   */
  public async consolidateNow(): Promise<SourceConsolidation[]> {

    return Promise.all([...this.recorders.entries()].map(async ([ source, active ]): Promise<SourceConsolidation> => {

      try {

        await active.recorder.rotate();

        return { result: await this.scheduler.run(active.directory, active.fileName), source };
      } catch(error) {

        LOG.withSource(source).error("Consolidation failed: %s.", formatError(error));

        return { error: formatError(error), source };
      }
    }));
  }

  private async beginSession(sessionName?: string): Promise<SessionInfo> {

    if(this.stopPromise) {

      await this.stopPromise;
    }

    const startedAt = new Date();
    const dateDirectory = join(this.config.rootDirectory, dateDirectoryName(startedAt));
    const name = await resolveSessionName(sessionName, this.config.sessionName, dateDirectory);
    const directory = join(dateDirectory, name);

    await mkdir(directory, { recursive: true });

    const info: SessionInfo = { directory, name, startedAt };

    this.session = info;
    this.recording = true;

    LOG.info("Recording session %s started in %s.", name, directory);

    await Promise.all(this.targets.filter((target) => target.isOccupied).map(async (target) => this.startRecorder(target)));

    if(this.recording) {

      this.timer = setInterval(() => { void this.tick(); }, this.config.consolidationInterval * 1000);
    }

    return info;
  }

  private async startRecorder(target: RecordingTarget): Promise<void> {

    const session = this.session;
    const source = target.serviceName;

    if(!session || this.recorders.has(source)) {

      return;
    }

    const fileName = sanitizePathComponent(source);
    const directory = join(session.directory, fileName);
    const recorder = new PassthroughRecorder({ config: this.config, directory, sourceName: fileName });

    this.recorders.set(source, { directory, fileName, recorder, target });

    try {

      await runWithSourceContext({ sourceName: source }, async () => recorder.start());
    } catch(error) {

      this.recorders.delete(source);
      LOG.withSource(source).error("Unable to start recording: %s.", formatError(error));

      return;
    }

    // A stop or disconnect may have claimed the recorder while it was starting.
    if(this.recorders.get(source)?.recorder === recorder) {

      target.attachRecorder(recorder);
    }
  }

  private async stopRecorder(source: string): Promise<void> {

    const active = this.recorders.get(source);

    if(!active) {

      return;
    }

    this.recorders.delete(source);
    active.target.attachRecorder(null);

    await runWithSourceContext({ sourceName: source }, async () => {

      try {

        await active.recorder.stop();
        await this.scheduler.run(active.directory, active.fileName);
      } catch(error) {

        LOG.error("Final consolidation failed: %s.", formatError(error));
      }
    });
  }

  private async trackDrain(drain: Promise<void>): Promise<void> {

    this.pendingDrains.add(drain);

    try {

      await drain;
    } finally {

      this.pendingDrains.delete(drain);
    }
  }

  private async drainSession(): Promise<void> {

    await Promise.all([...this.recorders.keys()].map(async (source) => this.trackDrain(this.stopRecorder(source))));

    // Drains started by disconnects before stop() was called.
    await Promise.allSettled([...this.pendingDrains]);
    await this.scheduler.drain();
  }

  /**
   * Periodic rotate-and-consolidate pass. A tick that fires while the previous one is still running is skipped.
   */
  private async tick(): Promise<void> {

    if(this.tickInFlight || !this.recording) {

      return;
    }

    this.tickInFlight = true;

    LOG.debug("session", "Periodic rotation and consolidation of %d source(s).", this.recorders.size);

    try {

      await Promise.all([...this.recorders.entries()].map(async ([ source, active ]) => runWithSourceContext({ sourceName: source }, async () => {

        try {

          await active.recorder.rotate();

          const result = await this.scheduler.runIfIdle(active.directory, active.fileName);

          if(result?.skipped.length) {

            LOG.warn("%d unreadable segment(s) left in place.", result.skipped.length);
          }
        } catch(error) {

          LOG.error("Periodic consolidation failed: %s.", formatError(error));
        }
      })));
    } finally {

      this.tickInFlight = false;
    }
  }
}
