export { ServiceDiscovery } from "./service-discovery";
export { MdnsServiceBrowser, recordsOf } from "./mdns-browser";
export { parseTxtEntries, serverInfoFromAdvertisement, trimTrailingDot } from "./service-browser";

export type { DiscoveryStatus, ServiceDiscoveryOptions } from "./service-discovery";
export type { MdnsQuestion, MdnsServiceBrowserOptions, MdnsSocket } from "./mdns-browser";
export type {
  BrowserHandlers,
  ResolvedEndpoint,
  ServiceAdvertisement,
  ServiceBrowser,
  ServiceResolver,
} from "./service-browser";
