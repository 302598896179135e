export { ReverseProxyController, type ReverseProxyControllerOptions } from "./reverse-proxy-controller";
