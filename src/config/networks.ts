import fs from 'fs';
import path from 'path';
import { getAddress, isAddress } from 'ethers';
import { z } from 'zod';
import { NetworkDescriptor, SkippedNetwork } from '../types';
import { ConfigurationError } from '../utils/errors';

type Env = Record<string, string | undefined>;

const ControllerSchema = z.object({
  address: z.string().refine((value) => isAddress(value), { message: 'not a valid address' }),
  creationBlock: z.number().int().nonnegative(),
  collateralToken: z.string().optional(),
  platform: z.string().optional(),
});

const NetworkSchema = z.object({
  chainId: z.number().int().positive(),
  rpcEndpoints: z.array(z.string().min(1)).min(1),
  requiresAuthorityMiddleware: z.boolean().default(false),
  controllers: z.array(ControllerSchema).min(1),
});

const NetworksFileSchema = z.object({
  networks: z.record(z.unknown()),
});

export interface NetworkLoadResult {
  networks: NetworkDescriptor[];
  skipped: SkippedNetwork[];
}

const PLACEHOLDER = /\$\{([A-Z0-9_]+)\}/g;

const substituteEnv = (url: string, env: Env): { value: string; missing: string[] } => {
  const missing: string[] = [];
  const value = url.replace(PLACEHOLDER, (_match, name: string) => {
    const replacement = env[name];
    if (replacement === undefined || replacement === '') {
      missing.push(name);
      return '';
    }
    return replacement;
  });
  return { value, missing };
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Validates every network entry independently. A broken entry is skipped with
 * its reason; only an unreadable file or a file with no usable network throws.
 */
export const parseNetworks = (raw: unknown, env: Env = process.env): NetworkLoadResult => {
  const file = NetworksFileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigurationError(`Invalid networks file: ${formatIssues(file.error)}`);
  }

  const networks: NetworkDescriptor[] = [];
  const skipped: SkippedNetwork[] = [];

  for (const [name, entry] of Object.entries(file.data.networks)) {
    const parsed = NetworkSchema.safeParse(entry);
    if (!parsed.success) {
      skipped.push({ name, reason: formatIssues(parsed.error) });
      continue;
    }

    const endpoints = parsed.data.rpcEndpoints.map((url) => substituteEnv(url, env));
    const missing = endpoints.flatMap((endpoint) => endpoint.missing);
    if (missing.length > 0) {
      skipped.push({ name, reason: `unresolved RPC placeholders: ${[...new Set(missing)].join(', ')}` });
      continue;
    }

    networks.push({
      name,
      chainId: parsed.data.chainId,
      rpcEndpoints: endpoints.map((endpoint) => endpoint.value),
      requiresAuthorityMiddleware: parsed.data.requiresAuthorityMiddleware,
      controllers: parsed.data.controllers.map((controller) => ({
        address: getAddress(controller.address),
        creationBlock: controller.creationBlock,
        collateralToken: controller.collateralToken,
        platform: controller.platform,
      })),
    });
  }

  if (networks.length === 0) {
    const reasons = skipped.map((entry) => `${entry.name}: ${entry.reason}`).join(' | ');
    throw new ConfigurationError(`No usable network configuration${reasons ? ` (${reasons})` : ''}`);
  }

  return { networks, skipped };
};

export const loadNetworks = (filePath: string, env: Env = process.env): NetworkLoadResult => {
  const abs = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(abs, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read networks file ${abs}`, { cause: error });
  }
  return parseNetworks(raw, env);
};
