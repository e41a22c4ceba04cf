/**
 * Extractor Client
 * 
 * Drives yt-dlp. One invocation downloads and merges a source into a single
 * mp4; a separate metadata probe fetches the title.
 * Docs: https://github.com/yt-dlp/yt-dlp#usage-and-options
 */

import { z } from 'zod';
import { executeCommand, streamCommand, errorMessage, type CommandResult, type OutputStream } from '@reelvault/utils';
import { formatRoute, type RouteDescriptor } from '../routes.js';
import type { ClientIdentity } from '../identities.js';
import { logger } from '../logger.js';

export interface ExtractorConfig {
  binaryPath: string;
  format: string;
  ffmpegLocation: string | null;
  timeoutMs: number;
  probeTimeoutMs: number;
}

export const DEFAULT_FORMAT = 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best';

export interface ExtractorInvocation {
  source: string;
  route: RouteDescriptor;
  identity: ClientIdentity;
  /** Cookie file to send, or null */
  cookiesPath: string | null;
}

export interface DownloadInvocation extends ExtractorInvocation {
  outputPath: string;
  onLine: (line: string, stream: OutputStream) => void;
  signal?: AbortSignal;
}

const probeSchema = z.object({
  title: z.string().min(1),
});

export class ExtractorClient {
  private config: ExtractorConfig;

  constructor(config?: Partial<ExtractorConfig>) {
    this.config = {
      binaryPath: config?.binaryPath ?? 'yt-dlp',
      format: config?.format ?? DEFAULT_FORMAT,
      ffmpegLocation: config?.ffmpegLocation ?? null,
      timeoutMs: config?.timeoutMs ?? 30 * 60 * 1000,
      probeTimeoutMs: config?.probeTimeoutMs ?? 60 * 1000,
    };
  }

  get binaryPath(): string {
    return this.config.binaryPath;
  }

  /**
   * Arguments shared by every invocation: egress, identity and credential
   */
  private getStrategyArgs(invocation: ExtractorInvocation): string[] {
    const args: string[] = [];

    const proxy = formatRoute(invocation.route);
    if (proxy) {
      args.push('--proxy', proxy);
    }

    args.push('--extractor-args', `youtube:player_client=${invocation.identity.id}`);

    if (invocation.cookiesPath) {
      args.push('--cookies', invocation.cookiesPath);
    }

    return args;
  }

  buildDownloadArgs(invocation: ExtractorInvocation & { outputPath: string }): string[] {
    const args = [
      '-f', this.config.format,
      '--merge-output-format', 'mp4',
      '-o', invocation.outputPath,
      '--no-playlist',
      '--newline',
      '--progress',
    ];

    if (this.config.ffmpegLocation) {
      args.push('--ffmpeg-location', this.config.ffmpegLocation);
    }

    args.push(...this.getStrategyArgs(invocation));
    args.push('--', invocation.source);
    return args;
  }

  buildProbeArgs(invocation: ExtractorInvocation): string[] {
    return [
      '--dump-json',
      '--no-download',
      '--no-playlist',
      ...this.getStrategyArgs(invocation),
      '--',
      invocation.source,
    ];
  }

  /**
   * Run a download, streaming output lines as they arrive
   * 
   * @throws the spawn error when the binary cannot be started
   */
  async download(invocation: DownloadInvocation): Promise<CommandResult> {
    return streamCommand(this.config.binaryPath, this.buildDownloadArgs(invocation), {
      timeout: this.config.timeoutMs,
      signal: invocation.signal,
      onLine: invocation.onLine,
    });
  }

  /**
   * Best-effort title lookup; null on any failure
   */
  async probeTitle(invocation: ExtractorInvocation): Promise<string | null> {
    try {
      const result = await executeCommand(this.config.binaryPath, this.buildProbeArgs(invocation), {
        timeout: this.config.probeTimeoutMs,
      });
      if (result.exitCode !== 0) {
        logger.debug({ source: invocation.source, exitCode: result.exitCode }, 'Title probe failed');
        return null;
      }
      return parseProbeTitle(result.stdout);
    } catch (error) {
      logger.debug({ source: invocation.source, error: errorMessage(error) }, 'Title probe could not run');
      return null;
    }
  }

  /**
   * Get yt-dlp version, or null when it cannot be run
   */
  async getVersion(): Promise<string | null> {
    try {
      const result = await executeCommand(this.config.binaryPath, ['--version'], { timeout: 15000 });
      return result.exitCode === 0 ? result.stdout.trim() || null : null;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'yt-dlp not available');
      return null;
    }
  }
}

/**
 * Title from `--dump-json` output (first JSON line)
 */
export function parseProbeTitle(stdout: string): string | null {
  const firstLine = stdout.split('\n').find((line) => line.trim().startsWith('{'));
  if (!firstLine) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(firstLine);
  } catch {
    return null;
  }

  const parsed = probeSchema.safeParse(json);
  return parsed.success ? parsed.data.title : null;
}
