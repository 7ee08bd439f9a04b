export { WsServer } from "./ws-server.js";
export type { WsServerOptions } from "./ws-server.js";
export { QaGateway } from "./qa-gateway.js";
export type { QaGatewayOptions } from "./qa-gateway.js";
export * from "./wire.js";
