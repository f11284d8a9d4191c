/**
 * Typed API of the modernizer operations toolkit
 */

/** @public */
export type { Result, ErrorGuidance, ToolContext, RepositoryTool } from './types';
/** @public */
export { Success, Failure } from './types';

// Configuration
export {
  resolveRuntimeConfig,
  loadEnvironmentConfig,
  parameterName,
  COMPONENTS,
  MODEL_CATALOG,
  type RuntimeConfig,
  type CliOverrides,
  type Component,
  type ComponentSelection,
} from './config';

// Deployment workflows
export {
  parseComponentSelection,
  componentsFor,
  resolveDeploymentConfig,
  resolveRepositories,
  formatDeploymentSummary,
  buildImages,
  pushImages,
  updateServices,
  runLocalStack,
  inspectRepository,
  createWorkflowContext,
  type WorkflowContext,
  type DeploymentConfig,
  type UpdateResult,
  type RepositoryReport,
} from './workflows';

// Infrastructure clients
export { createDockerClient, type DockerClient, type RegistryAuth } from './infra/docker/client';
export { createAwsClients, type AwsClients } from './infra/aws/clients';
export { createParameterStore, type ParameterStore } from './infra/aws/parameter-store';
export { createIdentity, type Identity } from './infra/aws/identity';
export { createRegistry, registryHost, type Registry } from './infra/aws/registry';
export { createOrchestrator, type Orchestrator } from './infra/aws/orchestrator';
export { createLogTailer, formatLogLine, type LogTailer } from './infra/aws/log-tailer';
export { runCdk, cdkArguments, type CdkAction } from './infra/cdk/runner';
export { runCommand, type CommandRunner } from './infra/process/run-command';
export { createAnalyzerClient, type AnalyzerClient } from './infra/analyzer/client';

// Repository tools and the analysis stream format
export { ALL_TOOLS, TOOL_NAME, getTool, runTool, type ToolName } from './tools';
export {
  encodeEvent,
  parseEventLine,
  AnalysisTranscript,
  type AnalysisEvent,
  type AnalysisEventType,
} from './events/analysis-events';

// Utilities
export { createLogger, type Logger } from './lib/logger';
export { checkHealth, type HealthReport } from './lib/health-checks';
export { createStreamReporter, silentReporter, type ProgressReporter } from './lib/progress';
