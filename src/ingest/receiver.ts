/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * receiver.ts: Callback contract between a network receiver and a device slot.
 */

/* A receiver owns the network side of one slot: discovery, pairing, the transport session and the stream decryption. It hands everything else to the slot through
 * these callbacks. Receivers call them from their own I/O loop and never wait on the result, except for onConnectionAttempt(), which gates the connection.
 *
 * The bytes passed to onVideoData() belong to the receiver and may be reused as soon as the call returns. The slot copies them before any asynchronous work.
 */
export interface ReceiverCallbacks {

  /**
   * The sender announced the video codec for the stream.
   * @param isH265 - True for H.265, false for H.264.
   */
  onCodecSet(isH265: boolean): void;

  /**
   * A device finished connecting.
   */
  onConnect(deviceId: string, model: string, name: string): void;

  /**
   * A device asks to connect. Called before any media flows.
   * @returns True to admit the device.
   */
  onConnectionAttempt(deviceId: string, model: string, name: string): boolean;

  /**
   * A connection ended. Some transports report the teardown without saying which device it belonged to.
   * @param deviceId - The device, when the transport knows it.
   */
  onDisconnect(deviceId?: string): void;

  /**
   * One packet of Annex-B video.
   * @param bytes - Start-code delimited NAL units. Valid only for the duration of the call.
   * @param isH265 - True if the packet is H.265.
   * @param ntpTimestamp - Local capture time in nanoseconds.
   */
  onVideoData(bytes: Uint8Array, isH265: boolean, ntpTimestamp: bigint): void;
}
