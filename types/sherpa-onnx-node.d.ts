// sherpa-onnx-node ships no type declarations; only the offline recognizer is used here.
declare module "sherpa-onnx-node" {
  interface OfflineRecognizerConfig {
    modelConfig: {
      whisper?: { encoder: string; decoder: string };
      tokens: string;
      numThreads?: number;
      provider?: string;
    };
  }

  interface OfflineStream {
    acceptWaveform(wave: { sampleRate: number; samples: Float32Array }): void;
  }

  interface OfflineRecognizerResult {
    text: string;
    lang?: string;
  }

  class OfflineRecognizer {
    constructor(config: OfflineRecognizerConfig);
    createStream(): OfflineStream;
    decode(stream: OfflineStream): void;
    getResult(stream: OfflineStream): OfflineRecognizerResult;
  }

  const sherpa: {
    OfflineRecognizer: typeof OfflineRecognizer;
  };

  export default sherpa;
}
