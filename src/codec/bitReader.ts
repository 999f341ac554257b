/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * bitReader.ts: RBSP bit reader with Exp-Golomb decoding.
 */

/**
 * Removes emulation prevention bytes from a NAL payload. Inside a NAL, the encoder inserts 0x03 after every 00 00 that would otherwise be followed by a byte of 0x03
 * or less. The raw byte sequence payload (RBSP) is the payload with those bytes removed.
 * @param data - NAL payload bytes.
 * @returns The RBSP. The input buffer is returned unchanged when it holds no emulation prevention bytes.
 */
export function unescapeRbsp(data: Buffer): Buffer {

  if(!data.includes(Buffer.from([ 0x00, 0x00, 0x03 ]))) {

    return data;
  }

  const output = Buffer.allocUnsafe(data.length);

  let zeros = 0;
  let length = 0;

  for(let i = 0; i < data.length; i++) {

    const byte = data[i];

    if((zeros >= 2) && (byte === 0x03) && (((i + 1) === data.length) || (data[i + 1] <= 0x03))) {

      zeros = 0;

      continue;
    }

    zeros = (byte === 0x00) ? (zeros + 1) : 0;
    output[length++] = byte;
  }

  return output.subarray(0, length);
}

/**
 * MSB-first bit reader over an RBSP. Reads past the end throw a RangeError.
 */
export class BitReader {

  private bitPosition = 0;
  private readonly data: Buffer;

  constructor(data: Buffer) {

    this.data = data;
  }

  /**
   * @returns The number of unread bits.
   */
  public get bitsLeft(): number {

    return (this.data.length * 8) - this.bitPosition;
  }

  public readBit(): number {

    if(this.bitPosition >= (this.data.length * 8)) {

      throw new RangeError("Read past the end of the bitstream.");
    }

    const byte = this.data[this.bitPosition >> 3];
    const bit = (byte >> (7 - (this.bitPosition & 7))) & 1;

    this.bitPosition++;

    return bit;
  }

  /**
   * Reads an unsigned fixed-width value of up to 32 bits.
   * @param count - Number of bits.
   * @returns The value.
   */
  public readBits(count: number): number {

    let value = 0;

    for(let i = 0; i < count; i++) {

      value = (value * 2) + this.readBit();
    }

    return value;
  }

  public readFlag(): boolean {

    return this.readBit() === 1;
  }

  public skipBits(count: number): void {

    if(count > this.bitsLeft) {

      throw new RangeError("Read past the end of the bitstream.");
    }

    this.bitPosition += count;
  }

  /**
   * Reads an unsigned Exp-Golomb value, ue(v).
   * @returns The decoded value.
   */
  public readUE(): number {

    let leadingZeros = 0;

    while(this.readBit() === 0) {

      leadingZeros++;

      if(leadingZeros > 31) {

        throw new RangeError("Exp-Golomb code longer than 32 bits.");
      }
    }

    return (2 ** leadingZeros) - 1 + this.readBits(leadingZeros);
  }

  /**
   * Reads a signed Exp-Golomb value, se(v).
   * @returns The decoded value.
   */
  public readSE(): number {

    const codeNum = this.readUE();

    return ((codeNum % 2) === 1) ? ((codeNum + 1) / 2) : -(codeNum / 2);
  }
}
