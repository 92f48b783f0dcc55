export { RedisJobStore } from "./RedisJobStore";
export type { RedisJobStoreOptions } from "./RedisJobStore";
