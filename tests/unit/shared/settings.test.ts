/**
 * Runtime settings Unit Tests
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { loadSettings } from '../../../src/core/settings.js';

describe('loadSettings', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      anthropicApiKey: undefined,
      deepgramApiKey: undefined,
      openaiApiKey: undefined,
      outputDir: path.join(os.homedir(), 'Documents', 'meeting-podcast'),
      workDir: path.join(os.tmpdir(), 'meeting-podcast'),
      musicPath: undefined,
      crossfadeSeconds: 0.3,
      colorExcerptSeconds: 0,
      synthesisConcurrency: 3,
      outputFormat: 'wav',
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
    });
  });

  it('reads keys, paths and numeric overrides', () => {
    const settings = loadSettings({
      OPENAI_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: '   ',
      PODCAST_OUTPUT_DIR: '/srv/podcasts',
      PODCAST_CROSSFADE_MS: '500',
      PODCAST_COLOR_EXCERPT_SEC: '2.5',
      PODCAST_SYNTHESIS_CONCURRENCY: '5',
      PODCAST_OUTPUT_FORMAT: 'mp3',
    });

    expect(settings.openaiApiKey).toBe('test-secret');
    expect(settings.anthropicApiKey).toBeUndefined();
    expect(settings.outputDir).toBe('/srv/podcasts');
    expect(settings.crossfadeSeconds).toBe(0.5);
    expect(settings.colorExcerptSeconds).toBe(2.5);
    expect(settings.synthesisConcurrency).toBe(5);
    expect(settings.outputFormat).toBe('mp3');
  });

  it('names every invalid variable', () => {
    expect(() => loadSettings({ PODCAST_OUTPUT_FORMAT: 'ogg', PODCAST_SYNTHESIS_CONCURRENCY: '0' })).toThrow(
      /^Invalid environment settings: .*PODCAST_SYNTHESIS_CONCURRENCY: .*PODCAST_OUTPUT_FORMAT: /,
    );
  });
});
