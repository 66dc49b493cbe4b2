/**
 * Tests for config command
 *
 * Every test points --config at a temporary file, so the user's
 * ~/.xslchunk/config.toml is never read or written.
 */

import * as fs from 'node:fs';
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext } from '../../types.js';
import { CONFIG_TEMPLATE, getConfigValue } from '../../../config/index.js';
import { stripAnsi } from '../../../utils/table.js';
import { createTempDir, type TempDir } from '../../../test-utils/index.js';

describe('createConfigCommand', () => {
  let dir: TempDir;
  let configFile: string;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: MockInstance<typeof console.log>;

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'config', ...args]);
  }

  function jsonOutput(): unknown {
    return JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
  }

  beforeEach(() => {
    dir = createTempDir();
    configFile = dir.resolve('config.toml');
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false, config: configFile },
      log: (msg: string) => logOutput.push(stripAnsi(msg)),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    dir.remove();
    process.exitCode = undefined;
  });

  describe('command structure', () => {
    it('registers every subcommand', () => {
      const cmd = createConfigCommand(() => mockContext);
      expect(cmd.commands.map((sub) => sub.name())).toEqual(['get', 'set', 'list', 'path', 'reset']);
    });
  });

  describe('get', () => {
    it('prints a value and creates the file on first use', async () => {
      await run('get', 'chunking.max_chunk_tokens');

      expect(logOutput).toEqual(['15000']);
      expect(fs.readFileSync(configFile, 'utf-8')).toBe(CONFIG_TEMPLATE);
    });

    it('prints lists as JSON', async () => {
      await run('get', 'detection.detectors');

      expect(logOutput).toEqual([
        '["unit","output_element","repetition","variable_cluster","conditional"]',
      ]);
    });

    it('outputs key and value as JSON', async () => {
      mockContext.options.json = true;

      await run('get', 'chunking.overlap_mode');

      expect(jsonOutput()).toEqual({ key: 'chunking.overlap_mode', value: 'fixed' });
    });

    it('reports unknown keys', async () => {
      await run('get', 'chunking.nope');

      expect(mockContext.error).toHaveBeenCalledWith('Unknown config key: chunking.nope');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('set', () => {
    it('writes the value to the config file', async () => {
      await run('set', 'chunking.overlap_target_lines', '3');

      expect(logOutput).toEqual(['✓ Set chunking.overlap_target_lines = 3']);
      expect(getConfigValue('chunking.overlap_target_lines', configFile)).toBe(3);
    });

    it('outputs the stored value as JSON', async () => {
      mockContext.options.json = true;

      await run('set', 'detection.detectors', '["unit", "repetition"]');

      expect(jsonOutput()).toEqual({
        success: true,
        key: 'detection.detectors',
        value: ['unit', 'repetition'],
      });
    });

    it('reports invalid values without writing', async () => {
      await run('set', 'chunking.overlap_mode', 'sliding');

      expect(mockContext.error).toHaveBeenCalledTimes(1);
      expect(vi.mocked(mockContext.error).mock.calls[0]?.[0]).toMatch(
        /^Invalid value for 'chunking.overlap_mode':/
      );
      expect(fs.existsSync(configFile)).toBe(false);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('list', () => {
    it('prints every key grouped by section', async () => {
      await run('list');

      expect(logOutput).toEqual([
        'Configuration:',
        '',
        '  chunking.max_chunk_tokens = 15000',
        '  chunking.min_chunk_tokens = 1500',
        '  chunking.overlap_target_lines = 5',
        '  chunking.overlap_mode = fixed',
        '  chunking.overlap_ratio = 0.05',
        '  chunking.overlap_tolerance_tokens = 0',
        '  chunking.chars_per_token = 4',
        '',
        '  detection.helper_patterns = ["(?:vmf:)?vmf\\\\d+"]',
        '  detection.detectors = ["unit","output_element","repetition","variable_cluster","conditional"]',
        '',
        `Config file: ${configFile}`,
      ]);
    });

    it('outputs a flat JSON object', async () => {
      mockContext.options.json = true;

      await run('ls');

      expect(jsonOutput()).toMatchObject({
        'chunking.max_chunk_tokens': 15000,
        'detection.helper_patterns': ['(?:vmf:)?vmf\\d+'],
      });
    });
  });

  describe('path', () => {
    it('prints the active config file', async () => {
      await run('path');

      expect(logOutput).toEqual([configFile]);
    });
  });

  describe('reset', () => {
    it('requires --force', async () => {
      await run('reset');

      expect(logOutput[0]).toBe('This will reset all configuration to defaults.');
      expect(process.exitCode).toBe(1);
      expect(fs.existsSync(configFile)).toBe(false);
    });

    it('restores the default file', async () => {
      fs.writeFileSync(configFile, '[chunking]\nmax_chunk_tokens = 9000\n', 'utf-8');

      await run('reset', '--force');

      expect(logOutput).toEqual(['✓ Configuration reset to defaults']);
      expect(fs.readFileSync(configFile, 'utf-8')).toBe(CONFIG_TEMPLATE);
    });
  });
});

describe('formatValue', () => {
  it('formats scalars and lists', () => {
    expect(formatValue('fixed')).toBe('fixed');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(0.05)).toBe('0.05');
    expect(formatValue(['unit'])).toBe('["unit"]');
  });
});
