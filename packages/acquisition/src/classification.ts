/**
 * Outcome Classification
 * 
 * Maps the extractor's exit code and output to success, a retryable failure
 * (with the part of the strategy to blame) or a fatal one. The signature
 * table is checked in order; the first match wins.
 */

export type RetryScope = 'route' | 'identity' | 'tool';

export type RetryableReason =
  | 'bot_check'
  | 'rate_limited'
  | 'network'
  | 'credential_rejected'
  | 'identity_blocked'
  | 'tool_unavailable'
  | 'unknown';

export type FatalReason = 'unsupported_source' | 'source_unavailable';

export type Classification =
  | { outcome: 'success' }
  | { outcome: 'retryable'; reason: RetryableReason; scope: RetryScope; message: string }
  | { outcome: 'fatal'; reason: FatalReason; message: string };

type Signature =
  | { kind: 'retryable'; reason: RetryableReason; scope: RetryScope; patterns: RegExp[] }
  | { kind: 'fatal'; reason: FatalReason; patterns: RegExp[] };

const SIGNATURES: readonly Signature[] = [
  {
    kind: 'retryable',
    reason: 'bot_check',
    scope: 'route',
    patterns: [/Sign in to confirm you(?:'|’)re not a bot/i],
  },
  {
    kind: 'retryable',
    reason: 'rate_limited',
    scope: 'route',
    patterns: [/HTTP Error 429/i, /Too Many Requests/i, /content isn(?:'|’)t available, try again later/i],
  },
  {
    kind: 'fatal',
    reason: 'unsupported_source',
    patterns: [/Unsupported URL/i],
  },
  {
    kind: 'fatal',
    reason: 'source_unavailable',
    patterns: [
      /Video unavailable/i,
      /Private video/i,
      /has been removed/i,
      /members-only/i,
      /This video is not available/i,
    ],
  },
  {
    kind: 'retryable',
    reason: 'credential_rejected',
    scope: 'route',
    patterns: [/cookies are no longer valid/i],
  },
  {
    kind: 'retryable',
    reason: 'identity_blocked',
    scope: 'identity',
    patterns: [
      /nsig extraction failed/i,
      /Requested format is not available/i,
      /PO Token/i,
      /HTTP Error 403/i,
    ],
  },
  {
    kind: 'retryable',
    reason: 'network',
    scope: 'route',
    patterns: [
      /Unable to connect/i,
      /Connection (?:refused|reset|timed out)/i,
      /ProxyError/i,
      /Tunnel connection failed/i,
      /Temporary failure in name resolution/i,
      /Name or service not known/i,
    ],
  },
];

/** Exit codes a shell reports for a missing or non-executable binary */
const TOOL_MISSING_EXIT_CODES = new Set([126, 127]);

/**
 * The most telling line of the output: the last ERROR line, else the last
 * non-empty one
 */
export function summarizeOutput(output: string): string {
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  const errors = lines.filter((line) => line.startsWith('ERROR:'));
  return errors[errors.length - 1] ?? lines[lines.length - 1] ?? '';
}

export function classify(exitCode: number, output: string): Classification {
  if (exitCode === 0) {
    return { outcome: 'success' };
  }

  const message = summarizeOutput(output);

  if (TOOL_MISSING_EXIT_CODES.has(exitCode) || message === '') {
    return {
      outcome: 'retryable',
      reason: 'tool_unavailable',
      scope: 'tool',
      message: message || `extractor exited with code ${exitCode} and no output`,
    };
  }

  for (const signature of SIGNATURES) {
    if (!signature.patterns.some((pattern) => pattern.test(output))) continue;

    if (signature.kind === 'fatal') {
      return { outcome: 'fatal', reason: signature.reason, message };
    }
    return { outcome: 'retryable', reason: signature.reason, scope: signature.scope, message };
  }

  return { outcome: 'retryable', reason: 'unknown', scope: 'route', message };
}
