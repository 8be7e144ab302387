export { PgConnections } from "./pg-connections.js";
export type { PgConnectionOptions } from "./pg-connections.js";
export { resolveDataDir, majorVersion } from "./data-dir.js";
export { withDeadline, cancelOnAbort } from "./deadline.js";
export { walFileAmount, countWalFiles, walDirectory } from "./wal-files.js";
export type { FetchContext, StatResources, StatSource } from "./types.js";
export { multixactMembers, countMemberSegments } from "./multixact.js";
export type { MultixactMembers } from "./multixact.js";
