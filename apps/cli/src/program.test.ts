import type { DocumentOutline } from '@pdf-outline/model';
import type { SettingsInput } from '@pdf-outline/outline-extractor';

import chalk from 'chalk';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  type MockInstance,
  afterEach,
  beforeEach,
  describe,
  expect,
  test,
  vi,
} from 'vitest';

import { createProgram, runCli } from './program';

vi.mock('@pdf-outline/pdf-parser', () => ({
  PdfLayoutReader: vi.fn(),
}));

const settings: SettingsInput = {
  headingDetection: {
    fontSizeDifferenceFromDominant: 2,
    boldFontSizeMinRatioToDominant: 0.9,
    maxWordsForBoldHeading: 10,
    maxWordsForAllCapsHeading: 8,
  },
  headingKeywords: ['Introduction'],
  noisePatterns: ['^page \\d+$'],
};

const outline: DocumentOutline = {
  title: 'Annual Report',
  outline: [{ level: 'H1', text: 'Introduction', page: 1 }],
};

describe('cli', () => {
  let workDir: string;
  let configPath: string;
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(async () => {
    chalk.level = 0;
    workDir = await mkdtemp(join(tmpdir(), 'pdf-outline-cli-'));
    configPath = join(workDir, 'settings.json');
    await writeFile(configPath, JSON.stringify(settings));
    await writeFile(join(workDir, 'report.pdf'), '%PDF-1.7');
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  describe('runCli', () => {
    test('processes the input and returns 0', async () => {
      const process = vi.fn().mockResolvedValue(outline);
      const output = join(workDir, 'out');

      const code = await runCli(
        workDir,
        { output, config: configPath, concurrency: 1 },
        () => ({ process }),
      );

      expect(code).toBe(0);
      expect(await readFile(join(output, 'report.json'), 'utf-8')).toBe(
        JSON.stringify(outline, null, 4),
      );
    });

    test('returns 1 when the settings file is missing', async () => {
      const missing = join(workDir, 'missing.json');

      const code = await runCli(
        workDir,
        { output: join(workDir, 'out'), config: missing, concurrency: 1 },
        () => ({ process: vi.fn() }),
      );

      expect(code).toBe(1);
      expect(consoleError).toHaveBeenCalledWith(
        `Settings file not found: ${missing}`,
      );
    });

    test('prints every settings issue', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ ...settings, noisePatterns: 'x' }),
      );

      const code = await runCli(
        workDir,
        { output: join(workDir, 'out'), config: configPath, concurrency: 1 },
        () => ({ process: vi.fn() }),
      );

      expect(code).toBe(1);
      expect(consoleError).toHaveBeenCalledWith(
        'Invalid settings\n  - noisePatterns: Invalid input: expected array, received string',
      );
    });

    test('returns 1 when the input does not exist', async () => {
      const code = await runCli(
        join(workDir, 'nowhere'),
        { output: join(workDir, 'out'), config: configPath, concurrency: 1 },
        () => ({ process: vi.fn() }),
      );

      expect(code).toBe(1);
    });
  });

  describe('createProgram', () => {
    test('parses options and runs the batch', async () => {
      const process = vi.fn().mockResolvedValue(outline);
      const output = join(workDir, 'out');

      await createProgram(() => ({ process })).parseAsync(
        [
          workDir,
          '-o',
          output,
          '-c',
          configPath,
          '--page-offset',
          '-1',
          '-j',
          '2',
        ],
        { from: 'user' },
      );

      expect(process).toHaveBeenCalledWith(join(workDir, 'report.pdf'), {
        pageOffset: -1,
      });
      expect(globalThis.process.exitCode).toBe(0);
    });

    test('rejects a concurrency below 1', async () => {
      const program = createProgram(() => ({ process: vi.fn() }))
        .exitOverride()
        .configureOutput({ writeErr: () => {} });

      await expect(
        program.parseAsync([workDir, '-j', '0'], { from: 'user' }),
      ).rejects.toThrow('Must be at least 1.');
    });
  });
});
