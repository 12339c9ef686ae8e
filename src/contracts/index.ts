export {
  default as ControllerContracts,
  controllerInterface,
  CONTROLLER_EVENT_TOPICS,
  CONTROLLER_TOPIC_FILTER,
} from './ControllerContracts';
export type { ControllerEventName } from './ControllerContracts';
export { CONTROLLER_ABI } from './abis/Controller.abi';
