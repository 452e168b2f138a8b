export { parseServerConfig, type ServerConfig } from "./config/index.js";
export { createConnectionLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";
export { collectOccurrences, occurrences, type Occurrence } from "./project/occurrences.js";
export { LineIndex } from "./project/text.js";
export { SymbolIndex } from "./project/symbol-index.js";
export { discoverAndIndex, WorkspaceRootError } from "./project/workspace.js";
export { toFileUri } from "./project/files.js";
export type { FileIndex, Token } from "./project/types.js";
export { WorkspaceIndexService } from "./server/index-service.js";
export { startServer, type StartServerOptions } from "./server.js";
