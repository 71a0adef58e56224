import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { ToolboxError } from '../utils/errors.js';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exit_code: number;
}

/**
 * Signals the shell and everything it started. The shell leads its own
 * process group, so the negative pid reaches grandchildren holding the pipes.
 */
function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, 'SIGTERM');
  } catch (err) {
    // ESRCH: the group already exited
    if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) {
      child.kill('SIGTERM');
    }
  }
}

/**
 * Runs `command` through the host shell and collects both streams in full.
 * Resolves with whatever exit code the command produced; rejects when the
 * shell cannot be spawned, the process is killed by a signal, or `timeoutMs`
 * expires. On timeout the whole process group is terminated and the promise
 * settles at once, without waiting for the pipes to close.
 */
export function runShellCommand(
  command: string,
  cwd: string,
  timeoutMs?: number
): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      cwd,
      shell: true,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    // decoded across chunk boundaries
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      finish();
    };

    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            killProcessGroup(child);
            child.stdout.destroy();
            child.stderr.destroy();
            settle(() =>
              reject(
                new ToolboxError(
                  `Command timed out after ${timeoutMs}ms: ${command}`,
                  'HOST_EXECUTION_FAILURE'
                )
              )
            );
          }, timeoutMs);

    child.on('close', (code, signal) => {
      settle(() => {
        if (code === null) {
          reject(
            new ToolboxError(
              `Command terminated by signal ${signal ?? 'unknown'}: ${command}`,
              'HOST_EXECUTION_FAILURE'
            )
          );
        } else {
          resolve({ stdout, stderr, exit_code: code });
        }
      });
    });

    child.on('error', (err) => {
      settle(() => reject(new ToolboxError(err.message, 'HOST_EXECUTION_FAILURE', { cause: err })));
    });
  });
}

const failurePayload = (message: string): CommandOutput => ({
  stdout: '',
  stderr: message,
  exit_code: 1,
});

export function createExecuteCommandTool(
  options: { timeoutMs?: number } = {}
): ToolDefinition<CommandOutput> {
  return {
    name: 'execute_command',
    description:
      'Execute a shell command and return its stdout, stderr and exit code. ' +
      'The command is interpreted by the host shell. A non-zero exit code is ' +
      'reported in exit_code and does not make the call fail; success is false ' +
      'only when the command could not be run to completion.',
    parameters: {
      type: 'object',
      properties: {
        command: { type: 'string', description: 'The shell command to execute.' },
      },
      required: ['command'],
    },

    failurePayload,

    async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<CommandOutput>> {
      const command = stringArg(args, 'command');
      return capture(
        () => runShellCommand(command, ctx.cwd, options.timeoutMs),
        failurePayload,
        'HOST_EXECUTION_FAILURE'
      );
    },
  };
}
