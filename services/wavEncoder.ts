/**
 * 16-bit PCM WAV framing for the mono samples captured from the microphone.
 */

const WAV_HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;

/** Averages input samples down to `outputRate`. Never upsamples. */
export const downsampleBuffer = (input: Float32Array, inputRate: number, outputRate: number): Float32Array => {
  if (outputRate >= inputRate) {
    return input.slice();
  }

  const ratio = inputRate / outputRate;
  const outputLength = Math.floor(input.length / ratio);
  const output = new Float32Array(outputLength);

  for (let i = 0; i < outputLength; i++) {
    const start = Math.floor(i * ratio);
    const end = Math.min(input.length, Math.floor((i + 1) * ratio));
    let sum = 0;
    for (let j = start; j < end; j++) {
      sum += input[j] ?? 0;
    }
    output[i] = end > start ? sum / (end - start) : 0;
  }

  return output;
};

export const encodeWav = (samples: Float32Array, sampleRate: number): ArrayBuffer => {
  const dataSize = samples.length * BYTES_PER_SAMPLE;
  const buffer = new ArrayBuffer(WAV_HEADER_BYTES + dataSize);
  const view = new DataView(buffer);

  const writeString = (offset: number, value: string) => {
    for (let i = 0; i < value.length; i++) {
      view.setUint8(offset + i, value.charCodeAt(i));
    }
  };

  writeString(0, 'RIFF');
  view.setUint32(4, 36 + dataSize, true);
  writeString(8, 'WAVE');
  writeString(12, 'fmt ');
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);
  view.setUint16(22, 1, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * BYTES_PER_SAMPLE, true);
  view.setUint16(32, BYTES_PER_SAMPLE, true);
  view.setUint16(34, 16, true);
  writeString(36, 'data');
  view.setUint32(40, dataSize, true);

  let offset = WAV_HEADER_BYTES;
  for (let i = 0; i < samples.length; i++) {
    const sample = Math.max(-1, Math.min(1, samples[i] ?? 0));
    view.setInt16(offset, sample < 0 ? sample * 0x8000 : sample * 0x7fff, true);
    offset += BYTES_PER_SAMPLE;
  }

  return buffer;
};

export const createWavBlob = (samples: Float32Array, sampleRate: number): Blob =>
  new Blob([encodeWav(samples, sampleRate)], { type: 'audio/wav' });
