import {
  createConnection,
  ErrorCodes,
  ProposedFeatures,
  ResponseError,
  type DefinitionParams,
  type InitializeParams,
  type InitializeResult,
  type Location,
  type ReferenceParams,
} from "vscode-languageserver/lib/node/main.js";
import { defaultServerConfig, type ServerConfig } from "./config/types.js";
import { createConnectionLogger } from "./logger.js";
import { isFileUri, toFilePath, toFileUri } from "./project/files.js";
import { WorkspaceRootError } from "./project/workspace.js";
import { WorkspaceIndexService } from "./server/index-service.js";

export type StartServerOptions = {
  connection?: ReturnType<typeof createConnection>;
  config?: ServerConfig;
};

const invalidParams = (message: string) => new ResponseError(ErrorCodes.InvalidParams, message);

/** Root directory from `rootUri`, falling back to the first workspace folder, then `rootPath`. */
export const resolveWorkspaceRoot = (params: InitializeParams): string => {
  const rootUri =
    params.rootUri ??
    params.workspaceFolders?.[0]?.uri ??
    (params.rootPath ? toFileUri(params.rootPath) : undefined);

  if (!rootUri) {
    throw invalidParams("This language server requires rootUri to be set");
  }
  if (!isFileUri(rootUri)) {
    throw invalidParams("rootUri doesn't seem to be a valid filepath");
  }
  return toFilePath(rootUri);
};

export const handleInitialize = async ({
  params,
  service,
}: {
  params: InitializeParams;
  service: WorkspaceIndexService;
}): Promise<InitializeResult> => {
  const root = resolveWorkspaceRoot(params);

  try {
    await service.initialize(root);
  } catch (error) {
    if (error instanceof WorkspaceRootError) {
      throw invalidParams("rootUri doesn't name a directory");
    }
    throw error;
  }

  return {
    capabilities: {
      definitionProvider: true,
      referencesProvider: true,
    },
  };
};

const documentUri = (uri: string): string => {
  if (!isFileUri(uri)) {
    throw invalidParams("Could not open file");
  }
  return uri;
};

export const handleDefinition = async ({
  params,
  service,
}: {
  params: DefinitionParams;
  service: WorkspaceIndexService;
}): Promise<Location | null> => {
  const uri = documentUri(params.textDocument.uri);
  return (await service.definitionAt(uri, params.position)) ?? null;
};

export const handleReferences = async ({
  params,
  service,
}: {
  params: ReferenceParams;
  service: WorkspaceIndexService;
}): Promise<Location[] | null> => {
  const uri = documentUri(params.textDocument.uri);
  const references = await service.referencesAt(
    uri,
    params.position,
    params.context.includeDeclaration,
  );
  return references ?? null;
};

export const startServer = ({
  connection = createConnection(ProposedFeatures.all),
  config = defaultServerConfig,
}: StartServerOptions = {}): void => {
  const logger = createConnectionLogger(connection.console, config.logLevel);
  const service = new WorkspaceIndexService({ logger, extensions: config.extensions });

  connection.onInitialize(async (params: InitializeParams) =>
    handleInitialize({ params, service }),
  );

  connection.onInitialized(() => {
    logger.info("server", "server initialized");
  });

  connection.onDefinition(async (params: DefinitionParams) =>
    handleDefinition({ params, service }),
  );

  connection.onReferences(async (params: ReferenceParams) =>
    handleReferences({ params, service }),
  );

  connection.onShutdown(() => undefined);

  connection.listen();
};
