export { AppSession } from "./app-session";

export type { AppSessionOptions } from "./app-session";
