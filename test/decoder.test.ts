import { describe, it, expect } from 'vitest';
import jpeg from 'jpeg-js';
import { RasterDecoder, sniffFormat } from '../src/decoder.js';
import { solidPng } from './helpers/mbtiles-fixture.js';

function solidJpeg(width: number, height: number): Uint8Array {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data.set([128, 128, 128, 255], i * 4);
  }
  return new Uint8Array(jpeg.encode({ width, height, data }, 90).data);
}

describe('sniffFormat', () => {
  it('should recognize PNG and JPEG signatures', () => {
    expect(sniffFormat(solidPng(1, 1, [0, 0, 0, 255]))).toBe('png');
    expect(sniffFormat(solidJpeg(8, 8))).toBe('jpeg');
  });

  it('should reject other data', () => {
    expect(sniffFormat(new Uint8Array([0x47, 0x49, 0x46, 0x38]))).toBeUndefined();
    expect(sniffFormat(new Uint8Array([0x89, 0x50]))).toBeUndefined();
    expect(sniffFormat(new Uint8Array())).toBeUndefined();
  });
});

describe('RasterDecoder', () => {
  const decoder = new RasterDecoder();

  it('should decode a PNG tile to RGBA', () => {
    const image = decoder.decode(solidPng(2, 3, [255, 0, 0, 255]));
    expect(image).toBeDefined();
    expect(image?.width).toBe(2);
    expect(image?.height).toBe(3);
    expect(image?.data.length).toBe(2 * 3 * 4);
    expect([...(image?.data.subarray(0, 4) ?? [])]).toEqual([255, 0, 0, 255]);
  });

  it('should decode a PNG held in a slice of a larger buffer', () => {
    const png = solidPng(1, 1, [0, 255, 0, 255]);
    const padded = new Uint8Array(png.length + 16);
    padded.set(png, 8);
    const image = decoder.decode(padded.subarray(8, 8 + png.length));
    expect([...(image?.data ?? [])]).toEqual([0, 255, 0, 255]);
  });

  it('should decode a JPEG tile to RGBA', () => {
    const image = decoder.decode(solidJpeg(8, 8));
    expect(image?.width).toBe(8);
    expect(image?.height).toBe(8);
    expect(image?.data.length).toBe(8 * 8 * 4);
    expect(image?.data[3]).toBe(255);
  });

  it('should return undefined for unknown formats', () => {
    expect(decoder.decode(new TextEncoder().encode('not an image'))).toBeUndefined();
  });

  it('should return undefined for a truncated PNG', () => {
    const png = solidPng(4, 4, [0, 0, 255, 255]);
    expect(decoder.decode(png.subarray(0, 20))).toBeUndefined();
  });
});
