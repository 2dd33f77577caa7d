/**
 * boostsmith command-line program
 */

import { Command, Option } from 'commander';
import {
  ValidationError,
  getConfig,
  validateConfig,
  type Config,
} from '@boostsmith/shared';
import {
  InstallOrchestrator,
  installOptionsFromConfig,
  renderInstallScript,
  writeInstallScript,
  type InstallOrchestratorOptions,
} from '@boostsmith/core';
import { formatError, formatInstallResult, formatPlanJson } from './format.js';
import {
  PLATFORMS,
  installOverrides,
  parsePlatform,
  toBuildRequestInput,
  type InstallCommandOptions,
  type PlanCommandOptions,
} from './options.js';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  io?: CliIO;
  loadConfig?: () => Config;
  createOrchestrator?: (options: InstallOrchestratorOptions) => InstallOrchestrator;
  setExitCode?: (code: number) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export function loadValidatedConfig(): Config {
  const check = validateConfig();
  if (!check.valid) {
    throw new ValidationError(`Invalid configuration: ${(check.errors ?? []).join('; ')}`, {
      issues: check.errors,
    });
  }
  return getConfig();
}

function addRequestOptions(command: Command): Command {
  return command
    .option('--ref <ref>', 'branch, tag or commit to build ("" keeps the default branch)')
    .option('--compiler <id>', "'gcc', or a CMake generator name on Windows")
    .option('--repo <url>', 'repository to clone')
    .option('--gpu', 'build with CUDA support')
    .option('--avx', 'build with AVX support')
    .option('--cuda-root <dir>', 'CUDA toolkit root (with --cuda-cc and --cuda-cxx)')
    .option('--cuda-cc <path>', 'C compiler for the CUDA build')
    .option('--cuda-cxx <path>', 'C++ compiler for the CUDA build')
    .option('--nccl <dir>', 'NCCL installation root');
}

export function createProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIO;
  const loadConfig = deps.loadConfig ?? loadValidatedConfig;
  const createOrchestrator =
    deps.createOrchestrator ?? ((options) => new InstallOrchestrator(options));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const fail = (error: unknown) => {
    io.stderr(formatError(error));
    setExitCode(1);
  };

  const program = new Command();
  program
    .name('boostsmith')
    .description('Fetch, build and install XGBoost and its R package from source')
    .version(VERSION);

  addRequestOptions(program.command('install').description('build and install from source'))
    .option('--work-root <dir>', 'parent directory for the per-run work directory')
    .option('--keep-workdir', 'leave the work directory in place afterwards')
    .option('--require-fresh', 'fail unless the package was freshly installed')
    .option('--json', 'print the result as JSON')
    .action(async (options: InstallCommandOptions) => {
      try {
        const config = loadConfig();
        const input = toBuildRequestInput(options);
        const orchestrator = createOrchestrator({
          ...installOptionsFromConfig(config),
          ...installOverrides(options),
        });

        if (!options.json) {
          orchestrator.on('stageChange', (_context, stage) => io.stderr(`==> ${stage}\n`));
        }

        const result = await orchestrator.install(input);
        io.stdout(
          options.json
            ? `${JSON.stringify(result, null, 2)}\n`
            : formatInstallResult(result, config.installer.packageName)
        );
        setExitCode(result.success ? 0 : 1);
      } catch (error) {
        fail(error);
      }
    });

  addRequestOptions(program.command('plan').description('print the install script without running it'))
    .addOption(
      new Option('--platform <platform>', 'platform to plan for (defaults to this host)').choices(
        PLATFORMS
      )
    )
    .option('--work-dir <dir>', 'work directory the script starts in')
    .option('--write <dir>', 'write the script into this directory instead of printing it')
    .option('--json', 'print the plan as JSON')
    .action(async (options: PlanCommandOptions) => {
      try {
        const config = loadConfig();
        const orchestrator = createOrchestrator(installOptionsFromConfig(config));
        const platform = parsePlatform(options.platform, orchestrator.hostPlatform);
        const plan = orchestrator.plan(toBuildRequestInput(options), platform);

        for (const warning of plan.warnings) {
          io.stderr(`warning: ${warning}\n`);
        }

        if (options.json) {
          io.stdout(formatPlanJson(plan));
          return;
        }

        const workDir = options.workDir ?? config.installer.workRoot;
        if (options.write !== undefined) {
          const target = await writeInstallScript(plan, workDir, options.write);
          io.stdout(`${target}\n`);
        } else {
          io.stdout(renderInstallScript(plan, workDir).content);
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
