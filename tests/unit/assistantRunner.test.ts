import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { runAssistant, substitutePromptFile } from '../../src/services/assistantRunner.js';

const node = process.execPath;

describe('substitutePromptFile', () => {
  it('replaces the placeholder wherever it appears', () => {
    expect(substitutePromptFile(['-p', '{prompt_file}'], '/tmp/p.txt')).toEqual(['-p', '/tmp/p.txt']);
    expect(substitutePromptFile(['--in={prompt_file}'], '/tmp/p.txt')).toEqual(['--in=/tmp/p.txt']);
  });

  it('appends the path when there is no placeholder', () => {
    expect(substitutePromptFile(['--quiet'], '/tmp/p.txt')).toEqual(['--quiet', '/tmp/p.txt']);
  });
});

describe('runAssistant', () => {
  it('hands the prompt file to the command and captures stdout', async () => {
    const script = "process.stdout.write(require('fs').readFileSync(process.argv[1], 'utf8').toUpperCase())";
    const result = await runAssistant({
      command: node,
      args: ['-e', script, '{prompt_file}'],
      prompt: 'summarize [MASKED_EMAIL]',
      timeoutMs: 10_000,
    });
    expect(result).toEqual({ stdout: 'SUMMARIZE [MASKED_EMAIL]', stderr: '', exitCode: 0, timedOut: false });
  });

  it('removes the prompt file once the command exits', async () => {
    const result = await runAssistant({
      command: node,
      args: ['-e', 'process.stdout.write(process.argv[1])'],
      prompt: 'x',
      timeoutMs: 10_000,
    });
    expect(result.stdout).toMatch(/prompt\.txt$/);
    expect(fs.existsSync(result.stdout)).toBe(false);
  });

  it('reports the exit code of a failing command', async () => {
    const result = await runAssistant({ command: node, args: ['-e', 'process.exit(3)'], prompt: 'x', timeoutMs: 10_000 });
    expect(result.exitCode).toBe(3);
  });
});
