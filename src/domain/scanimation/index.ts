export * from './contracts/frame-resampler.js';
export * from './contracts/frame-source.js';
export * from './contracts/image-sink.js';
export * from './entities/scanimation-job.js';
export * from './services/compositor.js';
export * from './services/interlacer.js';
export * from './services/mask-generator.js';
export * from './services/size-unifier.js';
export * from './value-objects/frame.js';
export * from './value-objects/geometry.js';
export * from './value-objects/scanimation-source.js';
