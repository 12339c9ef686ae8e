import { Interface } from 'ethers';
import { Address } from '../types';
import { Logger } from '../utils/logger';
import { describeError, ScanCancelled } from '../utils/errors';
import RpcGateway from '../services/rpc/RpcGateway';
import { CONTROLLER_ABI } from './abis/Controller.abi';

export const controllerInterface = new Interface(CONTROLLER_ABI);

export type ControllerEventName = 'Borrow' | 'Repay' | 'SoftLiquidation' | 'Liquidate' | 'UserState';

const CONTROLLER_EVENT_NAMES: readonly ControllerEventName[] = ['Borrow', 'Repay', 'SoftLiquidation', 'Liquidate', 'UserState'];

const topicOf = (name: ControllerEventName): string => {
  const fragment = controllerInterface.getEvent(name);
  if (!fragment) {
    throw new Error(`Controller ABI has no ${name} event`);
  }
  return fragment.topicHash.toLowerCase();
};

/** topic0 → event name for every log the scanner asks a controller for. */
export const CONTROLLER_EVENT_TOPICS: ReadonlyMap<string, ControllerEventName> = new Map(
  CONTROLLER_EVENT_NAMES.map((name) => [topicOf(name), name]),
);

export const CONTROLLER_TOPIC_FILTER: string[] = [...CONTROLLER_EVENT_TOPICS.keys()];

/**
 * Read-only controller views, cached per controller for the lifetime of one
 * network scan.
 */
class ControllerContracts {
  private readonly discounts = new Map<string, bigint>();

  constructor(
    private readonly gateway: RpcGateway,
    private readonly defaultDiscount: bigint,
    private readonly log: Logger,
  ) {}

  /**
   * WAD-scaled liquidation discount. Falls back to the configured default when
   * the controller does not expose the view or the call fails.
   */
  async getLiquidationDiscount(controller: Address, signal?: AbortSignal): Promise<{ discount: bigint; fromChain: boolean }> {
    const key = controller.toLowerCase();
    const cached = this.discounts.get(key);
    if (cached !== undefined) return { discount: cached, fromChain: true };

    try {
      const data = controllerInterface.encodeFunctionData('liquidation_discount');
      const raw = await this.gateway.call(controller, data, signal);
      const value: unknown = controllerInterface.decodeFunctionResult('liquidation_discount', raw)[0];
      if (typeof value !== 'bigint') {
        throw new Error(`liquidation_discount decoded to ${typeof value}`);
      }
      this.discounts.set(key, value);
      return { discount: value, fromChain: true };
    } catch (error) {
      if (error instanceof ScanCancelled) throw error;
      this.log.warn('Could not read liquidation_discount, using default', {
        controller,
        defaultDiscount: this.defaultDiscount,
        error: describeError(error),
      });
      return { discount: this.defaultDiscount, fromChain: false };
    }
  }
}

export default ControllerContracts;
