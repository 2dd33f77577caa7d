/**
 * Install Orchestrator
 * Coordinates one install run: acquire → configure → build → install → probe
 */

import {
  AcquisitionError,
  InstallerError,
  ProbeAmbiguousError,
  StageTimeoutError,
  createChildLogger,
  errorForStage,
  logStageTransition,
  logToolInvocation,
  wrapError,
  type HostPlatform,
  type InstallStage,
} from '@boostsmith/shared';
import { LocalGitClient } from '@boostsmith/git';
import { EventEmitter } from 'eventemitter3';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { CommandRunner, describeOutcome, type OutputLine } from './command-runner.js';
import { buildInstallPlan } from './install-plan.js';
import { PackageProbe, compareSnapshots } from './package-probe.js';
import { defaultParallelJobs, detectPlatform } from './platform.js';
import { parseBuildRequest } from './request.js';
import type {
  ExecStep,
  InstallContext,
  InstallLog,
  InstallOrchestratorConfig,
  InstallOrchestratorOptions,
  InstallPlan,
  InstallResult,
  InstallSuccess,
  PlanOptions,
  PlanStep,
} from './types.js';
import { DEFAULT_INSTALL_CONFIG } from './types.js';

interface InstallOrchestratorEvents {
  stageChange: (context: InstallContext, stage: InstallStage) => void;
  log: (context: InstallContext, log: InstallLog) => void;
  output: (context: InstallContext, line: OutputLine) => void;
  complete: (context: InstallContext, result: InstallSuccess) => void;
  error: (context: InstallContext, error: InstallerError) => void;
}

export type GitOperations = Pick<LocalGitClient, 'clone' | 'checkout' | 'revision'>;

export interface InstallOrchestratorDeps {
  git?: GitOperations;
  runner?: Pick<CommandRunner, 'run'>;
  probe?: Pick<PackageProbe, 'snapshot'>;
  platform?: HostPlatform;
}

export function resolveInstallConfig(
  options: InstallOrchestratorOptions = {}
): InstallOrchestratorConfig {
  return {
    ...DEFAULT_INSTALL_CONFIG,
    ...options,
    defaults: { ...DEFAULT_INSTALL_CONFIG.defaults, ...options.defaults },
    tools: { ...DEFAULT_INSTALL_CONFIG.tools, ...options.tools },
    stageTimeouts: { ...DEFAULT_INSTALL_CONFIG.stageTimeouts, ...options.stageTimeouts },
  };
}

export class InstallOrchestrator extends EventEmitter<InstallOrchestratorEvents> {
  private config: InstallOrchestratorConfig;
  private git: GitOperations;
  private runner: Pick<CommandRunner, 'run'>;
  private probe: Pick<PackageProbe, 'snapshot'>;
  private platform: HostPlatform;
  private logger = createChildLogger({ component: 'InstallOrchestrator' });

  constructor(options: InstallOrchestratorOptions = {}, deps: InstallOrchestratorDeps = {}) {
    super();
    this.config = resolveInstallConfig(options);
    this.platform = deps.platform ?? detectPlatform();
    this.runner = deps.runner ?? new CommandRunner({ outputTailLines: this.config.outputTailLines });
    this.git =
      deps.git ??
      new LocalGitClient({
        config: {
          binary: this.config.tools.git,
          timeoutMs: this.config.stageTimeouts.acquiring,
          recursive: true,
        },
      });
    this.probe =
      deps.probe ??
      new PackageProbe(this.runner, {
        rscript: this.config.tools.rscript,
        packageName: this.config.packageName,
        timeoutMs: this.config.stageTimeouts.probing,
      });
  }

  get hostPlatform(): HostPlatform {
    return this.platform;
  }

  /**
   * Build the command sequence for a request without running anything
   */
  plan(input: unknown, platform: HostPlatform = this.platform): InstallPlan {
    const request = parseBuildRequest(input, this.config.defaults);
    return buildInstallPlan(request, platform, this.planOptions());
  }

  /**
   * Install and report only whether the run succeeded
   */
  async run(input: unknown): Promise<boolean> {
    const result = await this.install(input);
    return result.success;
  }

  /**
   * Fetch, build and install the package described by the request
   */
  async install(input: unknown): Promise<InstallResult> {
    const startTime = Date.now();
    const installId = randomUUID().slice(0, 8);
    const workDir = join(this.config.workRoot, `boostsmith-${installId}`);
    const warnings: string[] = [];

    const context: InstallContext = {
      id: installId,
      workDir,
      stage: 'pending',
      startedAt: new Date(),
      logs: [],
    };

    try {
      const request = parseBuildRequest(input, this.config.defaults);
      const plan = buildInstallPlan(request, this.platform, this.planOptions());
      context.request = request;
      context.plan = plan;

      this.logger.info(
        {
          installId,
          repositoryUrl: request.repositoryUrl,
          sourceRef: request.sourceRef,
          platform: plan.platform,
          route: plan.route,
        },
        'Starting install'
      );

      for (const warning of plan.warnings) {
        warnings.push(warning);
        this.addLog(context, 'warn', warning);
      }

      await rm(workDir, { recursive: true, force: true });
      await mkdir(workDir, { recursive: true });

      const before = await this.probe.snapshot();
      const checkoutPath = join(workDir, plan.checkoutDir);

      for (const step of plan.steps) {
        if (context.stage !== step.stage) {
          this.enterStage(context, step.stage);
        }
        await this.runStep(context, step, checkoutPath);
      }

      const revision = await this.readRevision(context, checkoutPath);

      this.enterStage(context, 'probing');
      const after = await this.probe.snapshot();
      const verdict = compareSnapshots(before, after);
      this.addLog(context, 'info', `Probe verdict: ${verdict}`);

      if (verdict === 'missing') {
        throw new ProbeAmbiguousError(
          `Package '${this.config.packageName}' is not installed after the run`,
          { installId, verdict, packageName: this.config.packageName }
        );
      }

      if (verdict === 'unchanged') {
        const message = `Package '${this.config.packageName}' was not updated by the run`;
        if (this.config.requireFreshInstall) {
          throw new ProbeAmbiguousError(message, {
            installId,
            verdict,
            packageName: this.config.packageName,
          });
        }
        warnings.push(message);
        this.addLog(context, 'warn', message);
      }

      this.enterStage(context, 'complete');

      const result: InstallSuccess = {
        success: true,
        installId,
        stage: 'complete',
        platform: plan.platform,
        route: plan.route,
        probe: verdict,
        warnings,
        logs: context.logs,
        processingTimeMs: Date.now() - startTime,
      };
      if (after.location !== undefined) result.location = after.location;
      if (revision !== undefined) result.revision = revision;

      this.emit('complete', context, result);
      this.logger.info(
        { installId, probe: verdict, duration: result.processingTimeMs },
        'Install completed successfully'
      );

      return result;
    } catch (err) {
      const error = wrapError(err, { installId, stage: context.stage });
      const failedStage = error.stage ?? context.stage;

      this.addLog(context, 'error', error.message);
      this.logger.error(
        { installId, stage: failedStage, code: error.code, error: error.message },
        'Install failed'
      );

      context.stage = 'failed';
      this.emit('stageChange', context, 'failed');
      this.emit('error', context, error);

      return {
        success: false,
        installId,
        stage: failedStage,
        error,
        outputTail: error.outputTail,
        warnings,
        logs: context.logs,
        processingTimeMs: Date.now() - startTime,
      };
    } finally {
      if (this.config.keepWorkDir) {
        this.logger.info({ installId, workDir }, 'Keeping work directory');
      } else {
        await this.cleanup(workDir);
      }
    }
  }

  private planOptions(): PlanOptions {
    return {
      tools: this.config.tools,
      bindingDir: this.config.bindingDir,
      bindingLibraryFlag: this.config.bindingLibraryFlag,
      parallelJobs: this.config.parallelJobs ?? defaultParallelJobs(),
    };
  }

  private async runStep(
    context: InstallContext,
    step: PlanStep,
    checkoutPath: string
  ): Promise<void> {
    switch (step.kind) {
      case 'clone':
        logToolInvocation(context.id, step.stage, this.config.tools.git, [
          'clone',
          step.repositoryUrl,
        ]);
        this.addLog(context, 'info', `Cloning ${step.repositoryUrl}`);
        await this.acquire(`Failed to clone ${step.repositoryUrl}`, () =>
          this.git.clone(step.repositoryUrl, join(context.workDir, step.directory), {
            recursive: step.recursive,
          })
        );
        return;
      case 'checkout':
        logToolInvocation(context.id, step.stage, this.config.tools.git, ['checkout', step.ref]);
        this.addLog(context, 'info', `Checking out ${step.ref}`);
        await this.acquire(`Failed to check out '${step.ref}'`, () =>
          this.git.checkout(checkoutPath, step.ref, { recursive: step.recursive })
        );
        return;
      case 'mkdir':
        await mkdir(join(checkoutPath, step.path), { recursive: true });
        return;
      case 'exec':
        await this.runExec(context, step, checkoutPath);
        return;
    }
  }

  private async acquire(summary: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      if (error instanceof InstallerError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new AcquisitionError(`${summary}: ${detail}`);
    }
  }

  private async runExec(
    context: InstallContext,
    step: ExecStep,
    checkoutPath: string
  ): Promise<void> {
    const timeoutMs = this.config.stageTimeouts[step.stage];

    logToolInvocation(context.id, step.stage, step.command, step.args);
    this.addLog(context, 'info', `Running ${[step.command, ...step.args].join(' ')}`);

    const outcome = await this.runner.run(
      {
        command: step.command,
        args: step.args,
        cwd: join(checkoutPath, step.cwd),
        timeoutMs,
      },
      (line) => this.emit('output', context, line)
    );

    if (outcome.timedOut) {
      throw new StageTimeoutError(step.stage, timeoutMs, {
        installId: context.id,
        command: step.command,
        outputTail: outcome.output,
      });
    }

    if (outcome.error !== undefined || outcome.exitCode !== 0) {
      throw errorForStage(step.stage, describeOutcome(step.command, outcome), {
        installId: context.id,
        command: step.command,
        exitCode: outcome.exitCode,
        signal: outcome.signal,
        outputTail: outcome.output,
      });
    }

    this.addLog(context, 'info', `${step.command} finished in ${outcome.durationMs}ms`);
  }

  private async readRevision(
    context: InstallContext,
    checkoutPath: string
  ): Promise<string | undefined> {
    try {
      return await this.git.revision(checkoutPath);
    } catch (error) {
      this.logger.warn(
        { installId: context.id, error: error instanceof Error ? error.message : String(error) },
        'Could not read source revision'
      );
      return undefined;
    }
  }

  private enterStage(context: InstallContext, stage: InstallStage): void {
    logStageTransition(context.id, context.stage, stage);
    context.stage = stage;
    this.emit('stageChange', context, stage);
    this.addLog(context, 'info', `Starting ${stage} stage`);
  }

  private addLog(context: InstallContext, level: InstallLog['level'], message: string): void {
    const log: InstallLog = {
      stage: context.stage,
      timestamp: new Date(),
      level,
      message,
    };
    context.logs.push(log);
    this.emit('log', context, log);
  }

  private async cleanup(workDir: string): Promise<void> {
    try {
      await rm(workDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(
        { workDir, error: error instanceof Error ? error.message : String(error) },
        'Failed to remove work directory'
      );
    }
  }
}
