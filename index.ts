export * from './types';
export * from './errors';
export { loadConfig } from './config';
export type { AppConfig, EngineName } from './config';
export * from './utils/chunking';
export * from './utils/timing';
export * from './utils/pageRange';
export * from './utils/ssml';
export { mergeCleanedChunks, findOverlap } from './utils/textMerge';
export type { MergeOptions } from './utils/textMerge';
export { pcmToWav, readWavDuration } from './utils/wav';
export { FfmpegEncoder } from './utils/ffmpeg';
export { formatProgress, progressPercentage } from './utils/progress';
export * from './services/segmentSynthesizer';
export * from './services/audioStitcher';
export * from './services/timingReconstructor';
export * from './services/textCleaningService';
export * from './services/fileService';
export * from './services/geminiService';
export * from './services/ttsEngines';
export * from './services/pipelineOrchestrator';
