import path from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { formatError, toApplicationError } from './errors';
import { AudioStitcher } from './services/audioStitcher';
import { PdfTextExtractor } from './services/fileService';
import { GeminiLlmProvider } from './services/geminiService';
import { PipelineOrchestrator } from './services/pipelineOrchestrator';
import { TextCleaningService } from './services/textCleaningService';
import { TimingReconstructor } from './services/timingReconstructor';
import { createTtsEngine } from './services/ttsEngines';
import type { LLMProvider, PageRange } from './types';
import { FfmpegEncoder } from './utils/ffmpeg';
import { formatProgress } from './utils/progress';

const USAGE = `Usage: narrate <file.pdf> [--output name] [--start n] [--end n] [--timing] [--info]`;

const parsePage = (value: string | undefined, option: string): number | undefined => {
  if (value === undefined) return undefined;
  const page = Number(value);
  if (!Number.isInteger(page)) throw new Error(`--${option} must be a whole number, got "${value}"`);
  return page;
};

const createLlmProvider = (config: AppConfig): LLMProvider | null => {
  const apiKey = config.gemini.apiKey;
  if (!config.enableTextCleaning || !apiKey) return null;
  return new GeminiLlmProvider({ apiKey, model: config.gemini.llmModel });
};

const buildOrchestrator = (config: AppConfig): PipelineOrchestrator => {
  const engine = createTtsEngine(config);
  const encoder = new FfmpegEncoder(config.ffmpegPath);
  const stitcher = new AudioStitcher(encoder, {
    profile: { codec: 'libmp3lame', bitrate: config.audio.bitrate, sampleRate: config.audio.sampleRate },
    timeoutMs: config.ffmpegTimeoutSeconds * 1000,
  });

  return new PipelineOrchestrator(
    {
      extractor: new PdfTextExtractor(),
      cleaner: new TextCleaningService(createLlmProvider(config), {
        llmMaxChunkSize: config.llmMaxChunkSize,
        audioChunkSize: config.maxChunkSize,
      }),
      engine,
      stitcher,
      timing: new TimingReconstructor(engine, { stitcher, encoder }),
    },
    {
      outputDir: config.audioFolder,
      audioChunkSize: config.maxChunkSize,
      enableSsml: config.enableSsml,
      wordsPerMinute: config.wordsPerMinute,
      punctuationPauses: config.punctuationPauses,
      synthesis: {
        enableParallel: config.enableParallel,
        forceStrategy: config.forceParallel === null ? undefined : config.forceParallel ? 'parallel' : 'sequential',
        maxConcurrentRequests: config.maxConcurrentRequests,
      },
      onProgress: stats => console.log(formatProgress(stats)),
    },
  );
};

const main = async (argv: string[]): Promise<number> => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      start: { type: 'string' },
      end: { type: 'string' },
      timing: { type: 'boolean', default: false },
      info: { type: 'boolean', default: false },
    },
  });

  const pdfPath = positionals[0];
  if (!pdfPath) {
    console.error(USAGE);
    return 1;
  }

  const config = loadConfig();
  const orchestrator = buildOrchestrator(config);

  if (values.info) {
    const info = await orchestrator.getPdfInfo(pdfPath);
    console.log(`Title:  ${info.title}\nAuthor: ${info.author}\nPages:  ${info.totalPages}`);
    return info.totalPages > 0 ? 0 : 1;
  }

  const pageRange: PageRange = {
    startPage: parsePage(values.start, 'start'),
    endPage: parsePage(values.end, 'end'),
  };

  const result = await orchestrator.processPdf({
    pdfPath,
    outputName: values.output ?? path.basename(pdfPath, path.extname(pdfPath)),
    pageRange,
    withTiming: values.timing,
  });

  if (!result.success) {
    console.error(formatError(result.error));
    return 1;
  }

  const folder = config.audioFolder;
  if (result.debugInfo.estimatedSeconds !== undefined) {
    const minutes = Math.floor(result.debugInfo.estimatedSeconds / 60);
    const seconds = Math.round(result.debugInfo.estimatedSeconds % 60);
    console.log(`Estimated narration: ${minutes}m ${seconds}s`);
  }
  console.log(`Audio files (${result.audioFiles.length}) in ${folder}:`);
  result.audioFiles.forEach(file => console.log(`  ${file}`));
  if (result.combinedFile) console.log(`Combined: ${path.join(folder, result.combinedFile)}`);
  if (result.timingFile) console.log(`Timing:   ${path.join(folder, result.timingFile)}`);
  if (result.debugInfo.synthesisErrors) {
    console.warn(`${result.debugInfo.synthesisErrors} chunk(s) failed and were skipped`);
  }
  return 0;
};

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatError(toApplicationError(error)));
    process.exitCode = 1;
  },
);
