/**
 * Sobel Edge Kernel
 *
 * Row-ranged passes shared by the reference and parallel processors. The
 * two pass functions are also serialised into the worker thread source, so
 * they must stay self-contained: no imports, no closures, no helper calls.
 */

/**
 * Pass 1: integer (R+G+B)/3 grayscale for rows [startRow, endRow).
 * One- and two-channel input is already grey and is copied through.
 */
export function grayscaleRows(
  pixels: Uint8Array,
  channels: number,
  width: number,
  gray: Uint8Array,
  startRow: number,
  endRow: number
): void {
  for (let y = startRow; y < endRow; y++) {
    let p = y * width * channels;
    let g = y * width;
    for (let x = 0; x < width; x++) {
      if (channels >= 3) {
        gray[g] = Math.floor((pixels[p] + pixels[p + 1] + pixels[p + 2]) / 3);
      } else {
        gray[g] = pixels[p];
      }
      p += channels;
      g++;
    }
  }
}

/**
 * Pass 2: Sobel magnitude for interior pixels of rows [startRow, endRow).
 * Reads rows startRow-1 .. endRow from `gray`, which must be complete for
 * those rows. The outer 1-pixel border is never written.
 */
export function sobelRows(
  gray: Uint8Array,
  width: number,
  height: number,
  out: Uint8Array,
  startRow: number,
  endRow: number
): void {
  const first = Math.max(1, startRow);
  const last = Math.min(height - 1, endRow);

  for (let y = first; y < last; y++) {
    const above = (y - 1) * width;
    const row = y * width;
    const below = (y + 1) * width;

    for (let x = 1; x < width - 1; x++) {
      const topLeft = gray[above + x - 1];
      const top = gray[above + x];
      const topRight = gray[above + x + 1];
      const left = gray[row + x - 1];
      const right = gray[row + x + 1];
      const bottomLeft = gray[below + x - 1];
      const bottom = gray[below + x];
      const bottomRight = gray[below + x + 1];

      const gx = -topLeft - 2 * left - bottomLeft + topRight + 2 * right + bottomRight;
      const gy = -topLeft - 2 * top - topRight + bottomLeft + 2 * bottom + bottomRight;

      const magnitude = Math.round(Math.sqrt(gx * gx + gy * gy));
      out[row + x] = magnitude > 255 ? 255 : magnitude;
    }
  }
}

/**
 * Split `height` rows into at most `bands` contiguous [start, end) ranges.
 * The last band absorbs the remainder.
 */
export function splitRows(height: number, bands: number): Array<[number, number]> {
  if (height <= 0) return [];

  const count = Math.max(1, Math.min(Math.floor(bands), height));
  const rowsPerBand = Math.floor(height / count);
  const ranges: Array<[number, number]> = [];

  for (let band = 0; band < count; band++) {
    const start = band * rowsPerBand;
    const end = band === count - 1 ? height : start + rowsPerBand;
    ranges.push([start, end]);
  }

  return ranges;
}
