/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Line-by-line streaming for progress parsing
 * - Abort signal forwarding
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

export type OutputStream = 'stdout' | 'stderr';

export interface StreamCommandOptions extends CommandOptions {
  onLine: (line: string, stream: OutputStream) => void;
}

/**
 * Execute an external command safely
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { maxOutputSize = 10 * 1024 * 1024 } = options;

  let stdout = '';
  let stderr = '';

  return runProcess(command, args, options, (child) => {
    let stdoutSize = 0;
    let stderrSize = 0;

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    return () => ({ stdout, stderr });
  });
}

/**
 * Execute an external command, handing every output line to a callback as it arrives.
 * Only the last `tailLines` lines of each stream are kept in the result.
 */
export async function streamCommand(
  command: string,
  args: string[],
  options: StreamCommandOptions,
  tailLines = 200
): Promise<CommandResult> {
  const tails: Record<OutputStream, string[]> = { stdout: [], stderr: [] };

  return runProcess(command, args, options, (child) => {
    const attach = (stream: NodeJS.ReadableStream | null, name: OutputStream) => {
      if (!stream) return;
      const reader = createInterface({ input: stream, crlfDelay: Infinity });
      reader.on('line', (raw: string) => {
        // progress bars redraw with carriage returns
        for (const line of raw.split('\r')) {
          if (line.trim() === '') continue;
          const tail = tails[name];
          tail.push(line);
          if (tail.length > tailLines) tail.shift();
          options.onLine(line, name);
        }
      });
    };

    attach(child.stdout, 'stdout');
    attach(child.stderr, 'stderr');

    return () => ({
      stdout: tails.stdout.join('\n'),
      stderr: tails.stderr.join('\n'),
    });
  });
}

type OutputCollector = (child: ChildProcess) => () => { stdout: string; stderr: string };

function runProcess(
  command: string,
  args: string[],
  options: CommandOptions,
  collect: OutputCollector
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const output = collect(child);
    let killTimer: NodeJS.Timeout | undefined;

    // Handle timeout
    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    // Handle abort signal
    const onAbort = () => child.kill('SIGTERM');
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const cleanup = () => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    // Handle process exit
    child.on('close', (code, exitSignal) => {
      cleanup();
      const { stdout, stderr } = output();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
