export { default as RpcGateway } from './RpcGateway';
export { default as RpcEndpointPool, createJsonRpcClient, redactUrl } from './RpcEndpointPool';
export type { JsonRpcClient, RpcEndpoint, EndpointStats } from './RpcEndpointPool';
export { classifyRpcError } from './rpcErrors';
