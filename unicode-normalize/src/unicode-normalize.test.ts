import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { checkFile, runCheck, runCompare, runNormalize } from './unicode-normalize.js';
import { FileNotFoundError } from './normalizer/errors.js';

describe('unicode-normalize commands', () => {
  let tempDir: string;
  let configPath: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  function lastLogged(): string {
    const calls = logSpy.mock.calls;
    return String(calls[calls.length - 1][0]);
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'unicode-normalize-integration-test-'));

    configPath = path.join(tempDir, 'unicode-normalize.json');
    await fs.writeFile(configPath, JSON.stringify({ output: { color: false } }, null, 2));

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('checkFile', () => {
    it('should collect one issue per line that needs normalization', async () => {
      const filePath = path.join(tempDir, 'data.csv');
      await fs.writeFile(filePath, 'name,city\nＪｏｓé,Zürich\nplain,text\n①,café\n');

      const result = await checkFile(filePath);

      expect(result.linesChecked).toBe(4);
      expect(result.issues.map((issue) => issue.lineNumber)).toEqual([2, 4]);
      expect(result.issues[0].differences.map((d) => d.position)).toEqual([0, 1, 2]);
      expect(result.invalidLines).toEqual([]);
    });

    it('should throw FileNotFoundError for a missing file', async () => {
      await expect(checkFile(path.join(tempDir, 'missing.csv'))).rejects.toBeInstanceOf(
        FileNotFoundError
      );
    });
  });

  describe('runCheck', () => {
    it('should print the issue report and succeed', async () => {
      const filePath = path.join(tempDir, 'data.txt');
      await fs.writeFile(filePath, 'ok\ncafe\u0301\n');

      const exitCode = await runCheck(filePath, { configPath });

      expect(exitCode).toBe(0);
      expect(logSpy).toHaveBeenCalledWith(`Checking file: ${filePath}`);
      expect(lastLogged()).toBe(
        [
          '⚠ Found 1 line(s) with normalization issues:',
          '',
          'Line    2:',
          "  Column:   3 'e' (U+0065) → 'é' (U+00E9)",
          '  Length: 5 → 4 code units',
          ''
        ].join('\n')
      );
    });

    it('should confirm a normalized file', async () => {
      const filePath = path.join(tempDir, 'clean.txt');
      await fs.writeFile(filePath, 'hello\nworld\n');

      const exitCode = await runCheck(filePath, { configPath });

      expect(exitCode).toBe(0);
      expect(lastLogged()).toBe('✓ All text is properly normalized (Form KC)');
    });

    it('should honor the displayed issue limit', async () => {
      const filePath = path.join(tempDir, 'data.txt');
      await fs.writeFile(filePath, 'Ａ\nＢ\nＣ\n');

      await runCheck(filePath, { configPath, maxIssuesOverride: 1 });

      const lines = lastLogged().split('\n');
      expect(lines.filter((line) => line.startsWith('Line '))).toEqual(['Line    1:']);
      expect(lines[lines.length - 1]).toBe('... and 2 more issue(s)');
    });

    it('should fail when issues are found and failOnIssues is set', async () => {
      const filePath = path.join(tempDir, 'data.txt');
      await fs.writeFile(filePath, 'Ａ\n');

      expect(await runCheck(filePath, { configPath, failOnIssues: true })).toBe(1);
    });

    it('should print JSON when requested', async () => {
      const filePath = path.join(tempDir, 'data.txt');
      await fs.writeFile(filePath, 'ok\nＡ\n');

      await runCheck(filePath, { configPath, formatOverride: 'json' });

      expect(logSpy).toHaveBeenCalledTimes(1);
      const output = JSON.parse(lastLogged());
      expect(output.file).toBe(filePath);
      expect(output.linesChecked).toBe(2);
      expect(output.issueCount).toBe(1);
      expect(output.issues[0]).toEqual({
        lineNumber: 2,
        originalLine: 'Ａ',
        normalizedLine: 'A',
        differences: [{ position: 0, original: 'Ａ', normalized: 'A' }]
      });
    });

    it('should report a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.txt');

      const exitCode = await runCheck(filePath, { configPath });

      expect(exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(`Error: File not found: ${filePath}`);
    });

    it('should fail for a missing explicit config file', async () => {
      await expect(
        runCheck('data.txt', { configPath: path.join(tempDir, 'nope.json') })
      ).rejects.toThrow('Configuration file not found');
    });
  });

  describe('runNormalize', () => {
    it('should write the normalized file and report counts', async () => {
      const inputPath = path.join(tempDir, 'input.txt');
      const outputPath = path.join(tempDir, 'output.txt');
      await fs.writeFile(inputPath, 'first\n⽷ ﬁ\nthird\n');

      const exitCode = await runNormalize(inputPath, outputPath, { configPath });

      expect(exitCode).toBe(0);
      expect(await fs.readFile(outputPath, 'utf-8')).toBe('first\n糸 fi\nthird\n');
      expect(logSpy).toHaveBeenCalledWith(`Normalizing: ${inputPath} → ${outputPath}`);
      expect(logSpy).toHaveBeenCalledWith('✓ Complete: 3 lines processed, 1 lines normalized');
    });

    it('should print JSON when requested', async () => {
      const inputPath = path.join(tempDir, 'input.txt');
      const outputPath = path.join(tempDir, 'output.txt');
      await fs.writeFile(inputPath, 'Ａ\n\nB\n');

      await runNormalize(inputPath, outputPath, { configPath, formatOverride: 'json' });

      expect(JSON.parse(lastLogged())).toEqual({
        input: inputPath,
        output: outputPath,
        linesProcessed: 3,
        linesChanged: 1,
        invalidLines: []
      });
    });

    it('should report a missing input without creating the output', async () => {
      const inputPath = path.join(tempDir, 'missing.txt');
      const outputPath = path.join(tempDir, 'output.txt');

      const exitCode = await runNormalize(inputPath, outputPath, { configPath });

      expect(exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(`Error: File not found: ${inputPath}`);
      await expect(fs.access(outputPath)).rejects.toThrow();
    });

    it('should refuse to overwrite the input file', async () => {
      const filePath = path.join(tempDir, 'input.txt');
      await fs.writeFile(filePath, 'one\nＡ\n');

      const exitCode = await runNormalize(filePath, filePath, { configPath });

      expect(exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(`Error: Input and output are the same file: ${filePath}`);
      expect(await fs.readFile(filePath, 'utf-8')).toBe('one\nＡ\n');
    });
  });

  describe('runCompare', () => {
    it('should print the comparison verdict', async () => {
      const exitCode = await runCompare('⽷', '糸', { configPath });

      expect(exitCode).toBe(0);
      const lines = lastLogged().split('\n');
      expect(lines[lines.length - 1]).toBe('✓ Strings are equivalent after normalization');
    });

    it('should print JSON when requested', async () => {
      await runCompare('ｶ', 'カ', { configPath, formatOverride: 'json' });

      const output = JSON.parse(lastLogged());
      expect(output.equivalent).toBe(true);
      expect(output.normalizedFirstHex).toBe('30AB');
      expect(output.firstCharacters[0].isNfkc).toBe(false);
    });

    it('should reject malformed input', async () => {
      const exitCode = await runCompare('a', '\uD800', { configPath });

      expect(exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        'Error: Invalid Unicode text: unpaired surrogate at index 0'
      );
    });
  });
});
