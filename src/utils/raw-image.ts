import { ResourceReleasedError } from './errors.js';

/**
 * Downloaded, still-encoded image payload owned by one pipeline round.
 *
 * Reference counted: created with one reference held by its owner. Every
 * additional reader retains before use and releases afterwards. The payload
 * is dropped when the count reaches zero.
 */
export class RawImage {
  private data: Buffer | null;
  private refs = 1;
  public readonly byteLength: number;

  constructor(bytes: Buffer) {
    this.data = bytes;
    this.byteLength = bytes.length;
  }

  get bytes(): Buffer {
    if (!this.data) {
      throw new ResourceReleasedError('Image payload already released');
    }
    return this.data;
  }

  get refCount(): number {
    return this.refs;
  }

  get isReleased(): boolean {
    return this.data === null;
  }

  retain(): this {
    if (!this.data) {
      throw new ResourceReleasedError('Cannot retain a released image');
    }
    this.refs++;
    return this;
  }

  /**
   * Drop one reference. Returns true when this call released the payload.
   */
  release(): boolean {
    if (!this.data) {
      throw new ResourceReleasedError('Image released more times than retained');
    }
    this.refs--;
    if (this.refs === 0) {
      this.data = null;
      return true;
    }
    return false;
  }
}
