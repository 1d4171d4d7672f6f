/**
 * podcast CLI - Turn meeting recordings into short narrated podcasts
 *
 * Usage:
 *   podcast generate <audio-file> [options]
 *   podcast record [options]
 *
 * `generate` runs the upload workflow on an existing recording. `record`
 * captures the microphone until Ctrl+C, then runs the same pipeline on what
 * was heard. A second Ctrl+C cancels the job.
 */

import { resolve } from 'path';
import { Command } from 'commander';
import { FfmpegRunner } from '../core/audio/FfmpegRunner.js';
import { MissingCredentialError, createOrchestrator } from '../core/pipeline/createOrchestrator.js';
import { loadSettings } from '../core/settings.js';
import { logSink } from '../core/utils/Logger.js';
import { PODCAST_STYLES, VOICE_PRESETS } from '../shared/types.js';
import { VERSION } from '../shared/version.js';
import {
  CLIError,
  EXIT_SIGINT,
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  PodcastCli,
  exitCodeFor,
} from './PodcastCli.js';
import type { JobConfigOptions } from './PodcastCli.js';
import type { RuntimeSettings } from '../core/settings.js';
import type { JobStatus } from '../shared/types.js';

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',
  cross: '✘',
  arrow: '→',
  bullet: '•',
  line: '─',
} as const;

function banner(mode: string): void {
  console.log();
  console.log(`  podcast v${VERSION} ${SYMBOLS.bullet} ${mode}`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

const reporter = { step, success, fail };

// ============================================================================
// Shared option handling
// ============================================================================

interface CommonOptions extends JobConfigOptions {
  output?: string;
  format?: string;
  musicPath?: string;
  verbose: boolean;
}

function addJobOptions(command: Command): Command {
  return command
    .option('--voice <preset>', `Narrator voice (${VOICE_PRESETS.join(', ')})`)
    .option('--segments <count>', 'Number of key moments to narrate (3-10)')
    .option('--style <style>', `Narration style (${PODCAST_STYLES.join(', ')})`)
    .option('--music', 'Mix a background music bed under the podcast')
    .option('--intro-outro', 'Add a spoken intro and outro naming the meeting')
    .option('--denoise', 'Reduce background noise in original audio excerpts')
    .option('--title <title>', 'Meeting title used in narration and the manifest')
    .option('--output <dir>', 'Output directory (default: PODCAST_OUTPUT_DIR)')
    .option('--format <format>', 'Output format (wav, mp3)')
    .option('--music-path <file>', 'Music bed file (default: PODCAST_MUSIC_PATH)')
    .option('--verbose', 'Verbose output', false);
}

function resolveSettings(options: CommonOptions): RuntimeSettings {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (options.output) {
    env.PODCAST_OUTPUT_DIR = resolve(options.output);
  }
  if (options.format) {
    env.PODCAST_OUTPUT_FORMAT = options.format;
  }
  if (options.musicPath) {
    env.PODCAST_MUSIC_PATH = resolve(options.musicPath);
  }
  return loadSettings(env);
}

async function createCli(options: CommonOptions): Promise<PodcastCli> {
  if (options.verbose) {
    logSink.configure({ level: 'debug' });
  } else if (!process.env.PODCAST_LOG_LEVEL) {
    logSink.configure({ level: 'warn' });
  }
  const settings = resolveSettings(options);
  const ffmpeg = new FfmpegRunner({ ffmpegPath: settings.ffmpegPath, ffprobePath: settings.ffprobePath });
  if (!(await ffmpeg.checkAvailable())) {
    throw new CLIError(`ffmpeg not found (${settings.ffmpegPath}). Install it or set FFMPEG_PATH.`, 'user');
  }
  return new PodcastCli(createOrchestrator(settings), reporter);
}

function printResult(status: JobStatus): void {
  if (!status.output) {
    return;
  }
  const path = status.output.reference.artifactPath;
  console.log();
  console.log(`  Manifest: ${status.output.reference.manifestPath}`);
  console.log(`  Output:   ${path}`);
  // Stable prefix for scripts: `podcast generate ... | grep '^OUTPUT:'`
  console.log(`OUTPUT:${path}`);
  console.log();
}

function handleError(error: unknown, verbose: boolean): never {
  console.log();
  if (error instanceof MissingCredentialError) {
    fail(`${error.variable} is not set.`);
    process.exit(EXIT_USER_ERROR);
  }
  fail(error instanceof Error ? error.message : String(error));
  if (verbose && error instanceof Error && error.stack) {
    console.log();
    console.log(error.stack);
  }
  process.exit(exitCodeFor(error));
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('podcast')
  .description('Turn meeting recordings into short narrated podcasts')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

addJobOptions(
  program
    .command('generate')
    .description('Generate a podcast from a recorded meeting')
    .argument('<audio-file>', 'Path to the meeting recording')
    .option('--transcript <file>', 'Transcript JSON to use instead of transcribing'),
).action(async (audioFile: string, options: CommonOptions & { transcript?: string }) => {
  banner('Upload');

  let cli: PodcastCli;
  try {
    cli = await createCli(options);
  } catch (error) {
    handleError(error, options.verbose);
  }

  const interrupt = () => {
    console.log('\n  Interrupted, cancelling job...');
    cli.cancelActive();
    process.exit(EXIT_SIGINT);
  };
  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  const audioPath = resolve(audioFile);
  step(`Audio:  ${audioPath}`);
  if (options.transcript) {
    step(`Transcript: ${resolve(options.transcript)}`);
  }
  console.log();

  try {
    const status = await cli.generate({
      ...options,
      audioPath,
      transcriptPath: options.transcript ? resolve(options.transcript) : undefined,
    });
    printResult(status);
    process.exit(EXIT_SUCCESS);
  } catch (error) {
    handleError(error, options.verbose);
  }
});

addJobOptions(
  program
    .command('record')
    .description('Record a meeting from the microphone, then generate its podcast'),
).action(async (options: CommonOptions) => {
  banner('Live meeting');

  let cli: PodcastCli;
  try {
    cli = await createCli(options);
  } catch (error) {
    handleError(error, options.verbose);
  }

  let interrupts = 0;
  let requestStop: () => void = () => undefined;
  const stopped = new Promise<void>((resolveStop) => {
    requestStop = resolveStop;
  });

  const interrupt = () => {
    interrupts += 1;
    if (interrupts === 1) {
      console.log();
      requestStop();
      return;
    }
    console.log('\n  Interrupted, cancelling job...');
    cli.cancelActive();
    process.exit(EXIT_SIGINT);
  };
  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  try {
    const status = await cli.record(options, stopped);
    printResult(status);
    process.exit(EXIT_SUCCESS);
  } catch (error) {
    handleError(error, options.verbose);
  }
});

await program.parseAsync();
