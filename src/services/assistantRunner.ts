import { execa } from 'execa';
import { getLogger } from '../utils/logging.js';
import { withScopedTempFile, type ScopedTempOptions } from './tempWorkspace.js';

export const PROMPT_FILE_PLACEHOLDER = '{prompt_file}';

export interface AssistantInvocation {
  command: string;
  args?: string[];
  /** Already masked prompt; written to a scoped temp file for the command. */
  prompt: string;
  timeoutMs: number;
  temp?: ScopedTempOptions;
}

export interface AssistantResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export function substitutePromptFile(args: string[], file: string): string[] {
  if (!args.some((a) => a.includes(PROMPT_FILE_PLACEHOLDER))) return [...args, file];
  return args.map((a) => a.split(PROMPT_FILE_PLACEHOLDER).join(file));
}

export function runAssistant(inv: AssistantInvocation): Promise<AssistantResult> {
  return withScopedTempFile(
    inv.prompt,
    async (file) => {
      const args = substitutePromptFile(inv.args ?? [], file);
      const started = Date.now();
      const result = await execa(inv.command, args, { timeout: inv.timeoutMs, reject: false, stdin: 'ignore' });
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : 1;
      getLogger().info(
        { command: inv.command, exitCode, timedOut: result.timedOut, durationMs: Date.now() - started },
        'assistant-finished',
      );
      return { stdout: result.stdout, stderr: result.stderr, exitCode, timedOut: result.timedOut };
    },
    inv.temp,
  );
}
