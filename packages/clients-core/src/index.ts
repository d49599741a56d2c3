export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";
export { SpotClient, type ListenOptions } from "./spotClient.js";
export { AreaClient } from "./areaClient.js";
export { HealthClient } from "./healthClient.js";
export type * from "./types.js";
