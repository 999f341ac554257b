/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for NalVault.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. The merged configuration is handed to each component at construction time. Nothing reads configuration from ambient module state, which keeps
 * recorders and the session orchestrator testable with hand-built configurations.
 */

/**
 * Admission control for incoming source connections.
 */
export interface AdmissionConfig {

  // Device identifiers or display names that are refused at the connection attempt stage. Matching is case-insensitive and exact. Config file only.
  blocklist: string[];
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // Which HTTP requests morgan logs: "none", "errors" (4xx and 5xx only), or "all". Environment variable: HTTP_LOG_LEVEL. Default: "errors".
  httpLogLevel: HttpLogLevel;

  // Maximum size of the log file in bytes before it is trimmed to half. Environment variable: LOG_MAX_SIZE. Default: 1048576 (1 MiB).
  maxSize: number;
}

/**
 * HTTP request logging levels.
 */
export type HttpLogLevel = "all" | "errors" | "none";

/**
 * Filesystem paths that can be overridden independently of the data directory.
 */
export interface PathsConfig {

  // Absolute path to the log file. When null, the log file lives in the data directory as nalvault.log. Environment variable: NALVAULT_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * Live preview decoding. Preview uses an external ffmpeg process and never affects recording.
 */
export interface PreviewConfig {

  // Whether live preview decoding runs at all. Environment variable: PREVIEW_ENABLED. Default: true.
  enabled: boolean;

  // Path to the ffmpeg executable. When null, the system PATH is searched. Environment variable: FFMPEG_PATH.
  ffmpegPath: Nullable<string>;

  // Whether ffmpeg is asked to use hardware decoding (-hwaccel auto). Environment variable: PREVIEW_HWACCEL. Default: true.
  hardwareAcceleration: boolean;
}

/**
 * Recording and consolidation configuration.
 */
export interface RecordingConfig {

  // Interval in seconds between periodic segment rotation and consolidation passes while a session is active. Environment variable: CONSOLIDATION_INTERVAL.
  // Default: 300.
  consolidationInterval: number;

  // Integer ratio between the native source frame rate and the recorded frame rate. Non-keyframes are dropped when the per-source frame counter is a multiple of this
  // value. A ratio of 1 records every frame. Environment variable: FRAME_DROP_RATIO. Default: 2.
  frameDropRatio: number;

  // Root directory for recordings. Sessions are laid out as <root>/<yyyy-mm-dd>/<session>/<source>/. Environment variable: RECORDINGS_DIR.
  rootDirectory: string;

  // Maximum time in milliseconds a segment rotation waits for a keyframe before the segment is force-closed. Environment variable: ROTATION_KEYFRAME_TIMEOUT.
  // Default: 5000.
  rotationKeyframeTimeout: number;

  // Default session name. When empty, sessions are named Session01, Session02, ... within the current date directory. Environment variable: SESSION_NAME.
  sessionName: string;

  // Frame rate assumed for the duration of the first frame in a segment. Environment variable: TARGET_FRAME_RATE. Default: 15.
  targetFrameRate: number;

  // Number of times an append is retried while the segment writer reports back-pressure. Environment variable: WRITER_RETRY_ATTEMPTS. Default: 10.
  writerRetryAttempts: number;

  // Delay in milliseconds between writer readiness retries. Environment variable: WRITER_RETRY_DELAY. Default: 5.
  writerRetryDelay: number;
}

/**
 * HTTP server configuration.
 */
export interface ServerConfig {

  // Address the HTTP server binds to. Environment variable: HOST. Default: "0.0.0.0".
  host: string;

  // TCP port for the HTTP server. Environment variable: PORT. Default: 5590.
  port: number;
}

/**
 * Device slot configuration.
 */
export interface SlotsConfig {

  // Number of device slots created at startup. Environment variable: SLOT_COUNT. Default: 4.
  count: number;

  // Prefix for slot service names. Slot 1 is "<prefix>-01". Environment variable: SLOT_NAME_PREFIX. Default: "NalVault".
  namePrefix: string;
}

/**
 * Root configuration object.
 */
export interface Config {

  admission: AdmissionConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  preview: PreviewConfig;
  recording: RecordingConfig;
  server: ServerConfig;
  slots: SlotsConfig;
}

/*
 * SOURCE TYPES
 */

/**
 * Identity of a device currently connected to a slot.
 */
export interface SourceIdentity {

  // Stable device identifier reported by the network layer.
  deviceId: string;

  // Device model string (e.g., "iPad13,4").
  model: string;

  // Human-readable device name.
  name: string;
}

/**
 * Video coding standards a source may announce.
 */
export type VideoCodec = "h264" | "h265";

/*
 * API RESPONSE TYPES
 */

/**
 * Health check response.
 */
export interface HealthStatus {

  ffmpegAvailable: boolean;
  memory: {

    heapTotal: number;
    heapUsed: number;
    rss: number;
  };
  recording: {

    active: boolean;
    draining: boolean;
    recordingSources: number;
  };
  slots: {

    occupied: number;
    total: number;
  };
  status: "degraded" | "healthy";
  timestamp: string;
  uptime: number;
  version: string;
}
