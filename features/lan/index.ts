export { LanChannel } from "./lan-channel";
export { HttpsServerClient, isSuccessStatus, unwrapFetchError } from "./server-client";
export { certificateMatches, createPinnedAgent, createPinnedConnector } from "./certificate-pinning";

export type { LanChannelOptions } from "./lan-channel";
export type {
  HttpMethod,
  HttpsServerClientOptions,
  RequestOptions,
  ServerClient,
  ServerResponse,
} from "./server-client";
