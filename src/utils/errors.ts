import { BlockRange } from '../types';

export class ScannerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Retries and endpoint fallbacks are exhausted for one RPC call. */
export class RpcUnavailable extends ScannerError {
  constructor(
    readonly method: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`${method} failed after ${attempts} attempts: ${describeError(cause)}`, { cause });
  }
}

/** Provider refused the request because the block range or result set is too large. */
export class RpcRangeTooLarge extends ScannerError {
  constructor(
    readonly range: BlockRange,
    cause: unknown,
  ) {
    super(`Provider rejected range ${range.startBlock}-${range.endBlock}: ${describeError(cause)}`, { cause });
  }
}

/** A response that parses but violates what this network is configured to accept. */
export class RpcProtocolError extends ScannerError {}

/** Truncated or structurally invalid JSON-RPC payload; treated as transient. */
export class MalformedRpcResponse extends ScannerError {}

export class ScanCancelled extends ScannerError {
  constructor(operation: string) {
    super(`${operation} cancelled`);
  }
}

export class BlockResolutionFailed extends ScannerError {}

export class BlockResolutionAmbiguous extends ScannerError {}

export class ConfigurationError extends ScannerError {}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const nested = nestedRpcMessage(error);
    return nested && !error.message.includes(nested) ? `${error.message} (${nested})` : error.message;
  }
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};

// ethers wraps JSON-RPC failures and keeps the node's payload under `error` or `info.error`.
const nestedRpcMessage = (error: Error): string | undefined => {
  const candidates: unknown[] = [];
  if ('error' in error) candidates.push(error.error);
  if ('info' in error && isRecord(error.info) && 'error' in error.info) candidates.push(error.info.error);

  for (const candidate of candidates) {
    if (isRecord(candidate) && typeof candidate.message === 'string') {
      return candidate.message;
    }
  }
  return undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;
