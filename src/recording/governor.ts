/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * governor.ts: Frame-rate governor for passthrough recording.
 */

/* Senders typically deliver 30 or 60 frames per second, while recordings only need a fraction of that. The governor thins the stream without re-encoding by dropping
 * non-keyframes on a fixed cadence.
 *
 * It keeps one counter per source, incremented for every access unit that reaches it, keyframes included. A keyframe is always kept. A non-keyframe is kept only
 * when the counter is one past a multiple of the ratio, so one access unit in every ratio is recorded. With the default ratio of 2, an IDR followed by 29 P-frames
 * keeps the IDR and every other P-frame: 15 frames in all. The counter only resets when the recorder stops, so segment rotation does not change the cadence.
 *
 * Dropping a P-frame breaks the reference chain for the frames after it until the next IDR; players show the degradation as smearing, which recordings of slides and
 * screens tolerate well.
 */

export class FrameRateGovernor {

  private counter = 0;
  private readonly ratio: number;

  /**
   * @param ratio - Keep one access unit in every ratio, plus every keyframe. A ratio of 1 or less keeps everything.
   */
  constructor(ratio: number) {

    this.ratio = Math.floor(ratio);
  }

  /**
   * Counts an access unit and decides whether to keep it.
   * @param keyframe - True if the access unit is a keyframe.
   * @returns True if the access unit should be written.
   */
  public admit(keyframe: boolean): boolean {

    this.counter++;

    if(keyframe || (this.ratio <= 1)) {

      return true;
    }

    return ((this.counter - 1) % this.ratio) === 0;
  }

  /**
   * @returns The number of access units counted since the last reset.
   */
  public get count(): number {

    return this.counter;
  }

  public reset(): void {

    this.counter = 0;
  }
}
