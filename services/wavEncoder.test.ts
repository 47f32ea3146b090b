import { describe, expect, it } from 'vitest';
import { createWavBlob, downsampleBuffer, encodeWav } from './wavEncoder';

const readString = (view: DataView, offset: number, length: number) =>
  String.fromCharCode(...Array.from({ length }, (_, i) => view.getUint8(offset + i)));

describe('encodeWav', () => {
  it('writes a 16-bit mono PCM header', () => {
    const view = new DataView(encodeWav(new Float32Array(4), 16000));

    expect(view.byteLength).toBe(52);
    expect(readString(view, 0, 4)).toBe('RIFF');
    expect(view.getUint32(4, true)).toBe(44);
    expect(readString(view, 8, 4)).toBe('WAVE');
    expect(readString(view, 12, 4)).toBe('fmt ');
    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(16000);
    expect(view.getUint32(28, true)).toBe(32000);
    expect(view.getUint16(32, true)).toBe(2);
    expect(view.getUint16(34, true)).toBe(16);
    expect(readString(view, 36, 4)).toBe('data');
    expect(view.getUint32(40, true)).toBe(8);
  });

  it('scales and clamps samples', () => {
    const view = new DataView(encodeWav(new Float32Array([0, 1, -1, 0.5, 2, -3]), 16000));

    expect(view.getInt16(44, true)).toBe(0);
    expect(view.getInt16(46, true)).toBe(32767);
    expect(view.getInt16(48, true)).toBe(-32768);
    expect(view.getInt16(50, true)).toBe(16383);
    expect(view.getInt16(52, true)).toBe(32767);
    expect(view.getInt16(54, true)).toBe(-32768);
  });
});

describe('downsampleBuffer', () => {
  it('averages neighbouring samples', () => {
    const output = downsampleBuffer(new Float32Array([1, 3, 2, 4]), 32000, 16000);
    expect(Array.from(output)).toEqual([2, 3]);
  });

  it('returns a copy when the rate is already low enough', () => {
    const input = new Float32Array([0.25, 0.5]);
    const output = downsampleBuffer(input, 16000, 16000);

    expect(output).not.toBe(input);
    expect(Array.from(output)).toEqual([0.25, 0.5]);
  });
});

describe('createWavBlob', () => {
  it('labels the blob as audio/wav', () => {
    const blob = createWavBlob(new Float32Array(10), 16000);
    expect(blob.type).toBe('audio/wav');
    expect(blob.size).toBe(64);
  });
});
