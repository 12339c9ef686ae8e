import { isError } from 'ethers';
import { describeError, MalformedRpcResponse } from '../../utils/errors';

export type RpcFailureClass = 'retryable' | 'range' | 'fatal';

// Wording used by Alchemy, Infura, QuickNode, publicnode and geth for oversized log queries.
const RANGE_PATTERNS = [
  /block range/i,
  /range (is )?too (large|wide)/i,
  /query returned more than \d+ results/i,
  /too many (results|logs)/i,
  /response size (exceeded|is larger)/i,
  /limit exceeded/i,
  /exceed(s|ed)? .*(block|range|limit)/i,
];

const RATE_LIMIT_PATTERN = /\b429\b|too many requests|rate limit|capacity exceeded/i;

const TRANSIENT_PATTERNS = [
  /time(d)? ?out/i,
  /ETIMEDOUT|ECONNRESET|ECONNREFUSED|EAI_AGAIN|socket hang up/i,
  /\b50[0234]\b|bad gateway|service unavailable|gateway timeout|internal server error/i,
  /unexpected end of json|invalid json|unexpected token/i,
  /header not found/i,
];

export const classifyRpcError = (error: unknown): RpcFailureClass => {
  if (error instanceof MalformedRpcResponse) return 'retryable';

  const text = describeError(error);
  if (RATE_LIMIT_PATTERN.test(text)) return 'retryable';
  if (RANGE_PATTERNS.some((pattern) => pattern.test(text))) return 'range';

  if (
    isError(error, 'TIMEOUT') ||
    isError(error, 'NETWORK_ERROR') ||
    isError(error, 'SERVER_ERROR') ||
    isError(error, 'BAD_DATA')
  ) {
    return 'retryable';
  }

  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(text)) ? 'retryable' : 'fatal';
};
