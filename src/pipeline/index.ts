/**
 * Pipeline wiring shared by the HTTP and stdio entry points.
 */

import { SlitherAnalyzer } from "../analyzers/slither.js";
import { VersionResolver } from "../compiler/versionResolver.js";
import { CredentialTable } from "../explorer/credentials.js";
import { SourceFetcher } from "../explorer/sourceFetcher.js";
import { getPipelineConfig } from "../server/config.js";
import { logger } from "../utils/logger.js";
import { WorkspaceManager } from "../workspace/workspaceManager.js";
import { AnalysisPipeline } from "./AnalysisPipeline.js";

export async function createPipeline(env: NodeJS.ProcessEnv = process.env): Promise<AnalysisPipeline> {
  const config = getPipelineConfig(env);
  const credentials = await CredentialTable.load(env);

  logger.info("Pipeline configured", {
    stagingRoot: config.stagingRoot,
    explorerTimeout: config.explorerTimeout,
    analysisTimeout: config.analysisTimeout,
    excludeDetectors: config.excludeDetectors,
  });

  return new AnalysisPipeline({
    fetcher: new SourceFetcher({
      credentials,
      timeout: config.explorerTimeout,
      cacheTtl: config.sourceCacheTtl,
    }),
    workspaces: new WorkspaceManager(config.stagingRoot),
    compiler: new VersionResolver({ installTimeout: config.installTimeout }),
    analyzer: new SlitherAnalyzer({
      timeout: config.analysisTimeout,
      excludeDetectors: config.excludeDetectors,
    }),
  });
}
