// src/tokens.ts

export class TokenSource {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) { }

  static from(source: Uint8Array | string): TokenSource {
    return new TokenSource(typeof source === 'string' ? Buffer.from(source, 'latin1') : source);
  }

  get position(): number {
    return this.pos;
  }

  hasMore(): boolean {
    return this.pos < this.bytes.length;
  }

  next(): number {
    if (!this.hasMore()) {
      throw new RangeError(`token stream exhausted at offset ${this.pos}`);
    }
    return this.bytes[this.pos++] & 0xFF;
  }
}
