/**
 * Install pipeline exports
 */

export {
  InstallOrchestrator,
  resolveInstallConfig,
  type GitOperations,
  type InstallOrchestratorDeps,
} from './install-orchestrator.js';
export {
  ACCELERATOR_FLAG,
  VECTORIZATION_FLAG,
  COLLECTIVE_COMM_FLAG,
  buildInstallPlan,
  isKnownGenerator,
  unixFeatureFlags,
} from './install-plan.js';
export {
  CommandRunner,
  describeOutcome,
  type CommandOutcome,
  type CommandRunnerConfig,
  type CommandSpec,
  type LineListener,
  type OutputLine,
  type OutputStream,
} from './command-runner.js';
export { PackageProbe, compareSnapshots, type PackageProbeConfig } from './package-probe.js';
export {
  batchQuote,
  posixQuote,
  renderInstallScript,
  writeInstallScript,
  type RenderedScript,
} from './script-renderer.js';
export {
  buildRequestInputSchema,
  checkoutDirName,
  isCloneUrl,
  parseBuildRequest,
  type BuildRequestInput,
} from './request.js';
export { defaultParallelJobs, detectPlatform } from './platform.js';
export { installOptionsFromConfig } from './settings.js';
export * from './types.js';
