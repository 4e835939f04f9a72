export const VERSION = "0.1.0";

export const DEFAULT_USER_AGENT = `cdp-sdk-typescript/${VERSION}`;
