export * from "./errors.js";
export { delay } from "./delay.js";
export { recordId } from "./ids.js";
export * from "./grid/index.js";
export { UpstreamClient, type UpstreamClientConfig, type HttpTransport, type HttpResponse } from "./http/upstream-client.js";
export * from "./traffic/index.js";
export * from "./vehicle/index.js";
export * from "./polling/index.js";
export * from "./sink/index.js";
