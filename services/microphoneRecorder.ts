import { downsampleBuffer } from './wavEncoder';

const PROCESSOR_BUFFER_SIZE = 4096;

export type SamplesListener = (samples: Float32Array) => void;

/**
 * Captures mono microphone PCM and hands it out already downsampled to
 * `targetSampleRate`.
 */
export class MicrophoneRecorder {
  private stream: MediaStream | null = null;
  private audioContext: AudioContext | null = null;
  private source: MediaStreamAudioSourceNode | null = null;
  private processor: ScriptProcessorNode | null = null;

  constructor(private readonly targetSampleRate: number) {}

  get isRecording(): boolean {
    return this.stream !== null;
  }

  async start(onSamples: SamplesListener): Promise<void> {
    if (this.stream) return;

    if (!navigator.mediaDevices?.getUserMedia) {
      throw new Error('Recording requires a secure context (HTTPS or localhost) and a browser with microphone support.');
    }

    const stream = await navigator.mediaDevices.getUserMedia({
      audio: { channelCount: 1, echoCancellation: true, noiseSuppression: true }
    });
    let context: AudioContext | null = null;
    let source: MediaStreamAudioSourceNode;
    let processor: ScriptProcessorNode;
    try {
      const audioContext = new AudioContext();
      context = audioContext;
      source = audioContext.createMediaStreamSource(stream);
      processor = audioContext.createScriptProcessor(PROCESSOR_BUFFER_SIZE, 1, 1);

      processor.onaudioprocess = (event) => {
        const input = event.inputBuffer.getChannelData(0);
        onSamples(downsampleBuffer(input, audioContext.sampleRate, this.targetSampleRate));
      };

      source.connect(processor);
      processor.connect(audioContext.destination);
    } catch (error) {
      // Release the microphone before reporting the failure.
      stream.getTracks().forEach(track => track.stop());
      if (context && context.state !== 'closed') {
        await context.close();
      }
      throw error;
    }

    this.stream = stream;
    this.audioContext = context;
    this.source = source;
    this.processor = processor;
  }

  async stop(): Promise<void> {
    this.processor?.disconnect();
    this.source?.disconnect();
    if (this.processor) {
      this.processor.onaudioprocess = null;
    }
    this.stream?.getTracks().forEach(track => track.stop());
    if (this.audioContext && this.audioContext.state !== 'closed') {
      await this.audioContext.close();
    }

    this.stream = null;
    this.audioContext = null;
    this.source = null;
    this.processor = null;
  }
}
