export { sniff, sniffEndpoint, type SniffHandler } from "./sniffer";
