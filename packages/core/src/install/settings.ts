import type { Config } from '@boostsmith/shared';
import type { InstallOrchestratorOptions } from './types.js';

/**
 * Map loaded environment configuration onto orchestrator options
 */
export function installOptionsFromConfig(config: Config): InstallOrchestratorOptions {
  const { installer } = config;

  const options: InstallOrchestratorOptions = {
    workRoot: installer.workRoot,
    defaults: {
      repositoryUrl: installer.repositoryUrl,
      sourceRef: installer.sourceRef,
      compilerId: installer.compilerId,
    },
    packageName: installer.packageName,
    bindingDir: installer.bindingDir,
    bindingLibraryFlag: installer.bindingLibraryFlag,
    tools: { ...config.tools },
    stageTimeouts: { ...config.timeouts },
    outputTailLines: installer.outputTailLines,
    keepWorkDir: installer.keepWorkDir,
    requireFreshInstall: installer.requireFreshInstall,
  };
  if (installer.parallelJobs !== undefined) {
    options.parallelJobs = installer.parallelJobs;
  }
  return options;
}
