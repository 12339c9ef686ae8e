import { getAddress } from 'ethers';
import { z } from 'zod';
import { BlockHeader, RawLogEvent } from '../../types';
import { MalformedRpcResponse, RpcProtocolError } from '../../utils/errors';

/** Yellow-paper limit for the header extraData field. */
export const STANDARD_EXTRA_DATA_BYTES = 32;

const HEX_QUANTITY = /^0x[0-9a-fA-F]+$/;
const DECIMAL_QUANTITY = /^[0-9]+$/;
const HEX_DATA = /^0x([0-9a-fA-F]{2})*$/;

// Some nodes zero-pad quantities or answer in decimal; all of these are accepted.
const QuantitySchema = z.union([z.string(), z.number()]);
const HexDataSchema = z.string().regex(HEX_DATA, 'expected hex data');

const BlockSchema = z.object({
  number: QuantitySchema,
  timestamp: QuantitySchema,
  hash: z.string().nullable().optional(),
  extraData: HexDataSchema.optional(),
});

const LogSchema = z.object({
  address: z.string(),
  blockNumber: QuantitySchema,
  transactionHash: z.string(),
  transactionIndex: QuantitySchema,
  logIndex: QuantitySchema,
  topics: z.array(z.string()),
  data: HexDataSchema,
  removed: z.boolean().optional(),
});

export const parseQuantity = (value: string | number, field: string): number => {
  if (typeof value === 'number') {
    if (Number.isSafeInteger(value) && value >= 0) return value;
  } else if (HEX_QUANTITY.test(value)) {
    return Number(BigInt(value));
  } else if (DECIMAL_QUANTITY.test(value)) {
    return Number(value);
  }
  throw new MalformedRpcResponse(`Invalid quantity for ${field}: ${String(value)}`);
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const parseBlockNumber = (raw: unknown): number => {
  const parsed = QuantitySchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRpcResponse(`eth_blockNumber returned ${JSON.stringify(raw)}`);
  }
  return parseQuantity(parsed.data, 'blockNumber');
};

export const parseBlockHeader = (
  raw: unknown,
  requestedBlock: number,
  requiresAuthorityMiddleware: boolean,
): BlockHeader => {
  // A lagging node behind a load balancer may not know the block yet.
  if (raw === null || raw === undefined) {
    throw new MalformedRpcResponse(`Block ${requestedBlock} not available from endpoint`);
  }
  const parsed = BlockSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRpcResponse(`Malformed block ${requestedBlock}: ${describeIssues(parsed.error)}`);
  }

  const number = parseQuantity(parsed.data.number, 'number');
  const extraData = parsed.data.extraData ?? '0x';
  const extraDataBytes = (extraData.length - 2) / 2;

  let strippedExtraDataBytes = 0;
  let keptExtraData = extraData;
  if (extraDataBytes > STANDARD_EXTRA_DATA_BYTES) {
    if (!requiresAuthorityMiddleware) {
      throw new RpcProtocolError(
        `Block ${number} extraData is ${extraDataBytes} bytes (standard max ${STANDARD_EXTRA_DATA_BYTES}); ` +
          'set requiresAuthorityMiddleware for this network',
      );
    }
    keptExtraData = extraData.slice(0, 2 + STANDARD_EXTRA_DATA_BYTES * 2);
    strippedExtraDataBytes = extraDataBytes - STANDARD_EXTRA_DATA_BYTES;
  }

  return {
    number,
    timestamp: parseQuantity(parsed.data.timestamp, 'timestamp'),
    hash: parsed.data.hash ?? null,
    extraData: keptExtraData,
    strippedExtraDataBytes,
  };
};

export const parseLogs = (raw: unknown): RawLogEvent[] => {
  if (!Array.isArray(raw)) {
    throw new MalformedRpcResponse(`eth_getLogs returned ${raw === null ? 'null' : typeof raw} instead of an array`);
  }

  const events: RawLogEvent[] = [];
  for (const [index, entry] of raw.entries()) {
    const parsed = LogSchema.safeParse(entry);
    if (!parsed.success) {
      throw new MalformedRpcResponse(`Malformed log #${index}: ${describeIssues(parsed.error)}`);
    }
    if (parsed.data.removed) continue;

    events.push({
      address: getAddress(parsed.data.address),
      blockNumber: parseQuantity(parsed.data.blockNumber, 'blockNumber'),
      transactionHash: parsed.data.transactionHash.toLowerCase(),
      transactionIndex: parseQuantity(parsed.data.transactionIndex, 'transactionIndex'),
      logIndex: parseQuantity(parsed.data.logIndex, 'logIndex'),
      topics: parsed.data.topics.map((topic) => topic.toLowerCase()),
      data: parsed.data.data,
    });
  }
  return events;
};

export const parseHexData = (raw: unknown, method: string): string => {
  const parsed = HexDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRpcResponse(`${method} returned ${JSON.stringify(raw)}`);
  }
  return parsed.data;
};
