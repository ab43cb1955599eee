import { pixelTypeOf, type TypedArray } from '../../src/images/types';

export interface TiffPage {
  width: number;
  height: number;
  samplesPerPixel?: number;
  /** Interleaved samples, row by row. */
  data: TypedArray;
}

const SHORT = 3;
const LONG = 4;
const ENTRY_COUNT = 11;
const IFD_SIZE = 2 + ENTRY_COUNT * 12 + 4;

const sampleLayout = (data: TypedArray): { bits: number; format: number } => {
  switch (pixelTypeOf(data)) {
    case 'uint8':
      return { bits: 8, format: 1 };
    case 'int8':
      return { bits: 8, format: 2 };
    case 'uint16':
      return { bits: 16, format: 1 };
    case 'int16':
      return { bits: 16, format: 2 };
    case 'uint32':
      return { bits: 32, format: 1 };
    case 'int32':
      return { bits: 32, format: 2 };
    case 'float32':
      return { bits: 32, format: 3 };
    case 'float64':
      return { bits: 64, format: 3 };
  }
};

const even = (value: number) => value + (value % 2);

/**
 * Writes an uncompressed little-endian TIFF with one IFD per page, the way
 * ImageJ stores one plane per channel.
 */
export function writeTiff(pages: TiffPage[]): Uint8Array {
  const layout = pages.map((page) => {
    const samples = page.samplesPerPixel ?? 1;
    return { page, samples, extra: samples > 2 ? samples * 2 * 2 : 0 };
  });
  let offset = 8;
  const placed = layout.map((entry) => {
    const dataOffset = offset;
    offset = even(offset + entry.page.data.byteLength);
    const ifdOffset = offset;
    offset += IFD_SIZE;
    const extraOffset = offset;
    offset = even(offset + entry.extra);
    return { ...entry, dataOffset, ifdOffset, extraOffset };
  });

  const buffer = new ArrayBuffer(offset);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);
  bytes[0] = 0x49;
  bytes[1] = 0x49;
  view.setUint16(2, 42, true);
  view.setUint32(4, placed[0].ifdOffset, true);

  placed.forEach(({ page, samples, dataOffset, ifdOffset, extraOffset }, index) => {
    const { data, width, height } = page;
    bytes.set(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), dataOffset);
    const { bits, format } = sampleLayout(data);
    let extraPointer = extraOffset;

    const entries: Array<[number, number, number[]]> = [
      [256, LONG, [width]],
      [257, LONG, [height]],
      [258, SHORT, Array(samples).fill(bits)],
      [259, SHORT, [1]],
      [262, SHORT, [samples >= 3 ? 2 : 1]],
      [273, LONG, [dataOffset]],
      [277, SHORT, [samples]],
      [278, LONG, [height]],
      [279, LONG, [data.byteLength]],
      [284, SHORT, [1]],
      [339, SHORT, Array(samples).fill(format)],
    ];

    view.setUint16(ifdOffset, ENTRY_COUNT, true);
    entries.forEach(([tag, type, values], i) => {
      const position = ifdOffset + 2 + i * 12;
      view.setUint16(position, tag, true);
      view.setUint16(position + 2, type, true);
      view.setUint32(position + 4, values.length, true);
      if (type === LONG) {
        view.setUint32(position + 8, values[0], true);
      } else if (values.length <= 2) {
        values.forEach((value, j) => view.setUint16(position + 8 + j * 2, value, true));
      } else {
        view.setUint32(position + 8, extraPointer, true);
        values.forEach((value) => {
          view.setUint16(extraPointer, value, true);
          extraPointer += 2;
        });
      }
    });
    const next = placed[index + 1];
    view.setUint32(ifdOffset + 2 + ENTRY_COUNT * 12, next ? next.ifdOffset : 0, true);
  });

  return bytes;
}
