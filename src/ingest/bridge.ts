/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * bridge.ts: Fan-out of one slot's video to its preview decoder and recorder.
 */
import type { NalUnit } from "../codec/nal.js";
import type { Nullable, VideoCodec } from "../types/index.js";
import { demuxAnnexB } from "../codec/nal.js";

/* Each slot has one bridge. Every inbound packet is copied once, demultiplexed once, and the same NAL views go to both the preview decoder and the recorder. The copy
 * is what makes that safe: the receiver reuses its buffer after the callback returns, while both sinks hold on to the views in their own queues.
 *
 * The recorder sink changes as sessions start and stop. A newly attached recorder is told the current codec first, so a source that is already sending H.265 does
 * not get its packets misread as H.264.
 */

/**
 * Consumer of a slot's demultiplexed video.
 */
export interface MediaSink {

  pushNals(nals: readonly NalUnit[], timestamp: bigint): void;
  setCodec(codec: VideoCodec): void;
}

/**
 * Packet counters for a bridge.
 */
export interface BridgeStats {

  bytesReceived: number;
  packetsReceived: number;
}

export class ReceiverBridge {

  private codec: VideoCodec = "h264";
  private decoder: Nullable<MediaSink>;
  private recorder: Nullable<MediaSink> = null;
  private readonly statsData: BridgeStats = { bytesReceived: 0, packetsReceived: 0 };

  constructor(decoder: Nullable<MediaSink> = null) {

    this.decoder = decoder;
  }

  /**
   * @returns The codec last announced by the source.
   */
  public get currentCodec(): VideoCodec {

    return this.codec;
  }

  public get stats(): BridgeStats {

    return { ...this.statsData };
  }

  /**
   * @returns True while a recorder is attached.
   */
  public get hasRecorder(): boolean {

    return this.recorder !== null;
  }

  /**
   * Replaces the decoder sink.
   * @param sink - The decoder, or null to stop forwarding to one.
   */
  public attachDecoder(sink: Nullable<MediaSink>): void {

    this.decoder = sink;

    if(sink && (this.codec !== "h264")) {

      sink.setCodec(this.codec);
    }
  }

  /**
   * Replaces the recorder sink.
   * @param sink - The recorder, or null to stop forwarding to one.
   */
  public attachRecorder(sink: Nullable<MediaSink>): void {

    this.recorder = sink;

    if(sink && (this.codec !== "h264")) {

      sink.setCodec(this.codec);
    }
  }

  /**
   * Records a codec announcement and forwards it to both sinks.
   * @param codec - The codec.
   */
  public setCodec(codec: VideoCodec): void {

    this.codec = codec;
    this.decoder?.setCodec(codec);
    this.recorder?.setCodec(codec);
  }

  /**
   * Copies and demultiplexes one packet and hands the NAL units to both sinks.
   * @param bytes - The receiver's packet buffer.
   * @param timestamp - Capture timestamp in nanoseconds.
   */
  public push(bytes: Uint8Array, timestamp: bigint): void {

    this.statsData.packetsReceived++;
    this.statsData.bytesReceived += bytes.length;

    if(!this.decoder && !this.recorder) {

      return;
    }

    const nals = demuxAnnexB(Buffer.from(bytes), this.codec);

    if(nals.length === 0) {

      return;
    }

    this.decoder?.pushNals(nals, timestamp);
    this.recorder?.pushNals(nals, timestamp);
  }
}
