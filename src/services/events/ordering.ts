interface ChainPosition {
  blockNumber: number;
  transactionIndex: number;
  logIndex: number;
  transactionHash?: string;
}

/** Chain order: block, then transaction, then log index. */
export const compareCanonical = (a: ChainPosition, b: ChainPosition): number =>
  a.blockNumber - b.blockNumber ||
  a.transactionIndex - b.transactionIndex ||
  a.logIndex - b.logIndex ||
  (a.transactionHash ?? '').localeCompare(b.transactionHash ?? '');

export const logIdentity = (log: { transactionHash: string; logIndex: number }): string =>
  `${log.transactionHash.toLowerCase()}:${log.logIndex}`;
