export type Axis = 'row' | 'col';

export interface Bounds {
  top?: number;
  bottom?: number;
  left?: number;
  right?: number;
}

const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

/**
 * Single-channel 8-bit raster. Every boundary decision in the pipeline is made
 * on this channel alone, so crops and flips share the same immutable type.
 */
export class LightnessImage {
  constructor(
    readonly width: number,
    readonly height: number,
    readonly data: Uint8Array,
  ) {
    if (data.length !== width * height) {
      throw new Error(`Lightness buffer holds ${data.length} pixels, expected ${width}x${height}`);
    }
  }

  static filled(width: number, height: number, value: number): LightnessImage {
    return new LightnessImage(width, height, new Uint8Array(width * height).fill(value));
  }

  at(x: number, y: number): number {
    return this.data[y * this.width + x];
  }

  /** Half-open crop; bounds are clamped to the image like array slices. */
  crop(bounds: Bounds): LightnessImage {
    const top = clamp(Math.round(bounds.top ?? 0), 0, this.height);
    const bottom = clamp(Math.round(bounds.bottom ?? this.height), top, this.height);
    const left = clamp(Math.round(bounds.left ?? 0), 0, this.width);
    const right = clamp(Math.round(bounds.right ?? this.width), left, this.width);
    const w = right - left;
    const h = bottom - top;
    const out = new Uint8Array(w * h);
    for (let y = 0; y < h; y++) {
      const src = (top + y) * this.width + left;
      out.set(this.data.subarray(src, src + w), y * w);
    }
    return new LightnessImage(w, h, out);
  }

  /** Mirror left-to-right. */
  flipX(): LightnessImage {
    const out = new Uint8Array(this.data.length);
    for (let y = 0; y < this.height; y++) {
      const row = y * this.width;
      for (let x = 0; x < this.width; x++) {
        out[row + x] = this.data[row + this.width - 1 - x];
      }
    }
    return new LightnessImage(this.width, this.height, out);
  }

  /**
   * Split into `parts` bands along an axis. Sizes differ by at most one pixel
   * and the leading bands take the remainder.
   */
  split(parts: number, axis: Axis): LightnessImage[] {
    const total = axis === 'row' ? this.height : this.width;
    const base = Math.floor(total / parts);
    const extra = total % parts;
    const bands: LightnessImage[] = [];
    let start = 0;
    for (let i = 0; i < parts; i++) {
      const size = base + (i < extra ? 1 : 0);
      bands.push(axis === 'row'
        ? this.crop({ top: start, bottom: start + size })
        : this.crop({ left: start, right: start + size }));
      start += size;
    }
    return bands;
  }

  mean(): number {
    if (this.data.length === 0) return 0;
    let sum = 0;
    for (const v of this.data) sum += v;
    return sum / this.data.length;
  }

  max(): number {
    let m = 0;
    for (const v of this.data) if (v > m) m = v;
    return m;
  }

  get isEmpty(): boolean {
    return this.width === 0 || this.height === 0;
  }
}
