export * from './canvas-frame-resampler.js';
export * from './codecs/image-codec.js';
export * from './file-image-sink.js';
export * from './filesystem-frame-source.js';
