/**
 * Installs toolchain targets, components and system packages on the build host.
 *
 * Packages go through the host's package manager (apt-get, choco, brew),
 * after one index refresh where the manager keeps an index. The toolchain,
 * with its components and cross target, goes through rustup. Installs are
 * host-wide, so a successful install is remembered and not repeated.
 */

import { BuildEnvironment, InstallResult, ToolRequest, ToolchainInstaller } from '../engine/build-executor';
import { TargetOs } from '../domain/target';
import { describeError } from '../domain/errors';
import { logger } from '../logger';
import { CommandRunner, formatCommand } from './command-runner';

export interface SystemPackageInstallerOptions {
  /** Prefix Linux package installs with sudo. */
  useSudo?: boolean;
  /** Release channel installed through rustup. */
  channel?: string;
}

type Command = { command: string; args: string[] };

const DEFAULT_CHANNEL = 'stable';

const log = logger.child({ module: 'package-installer' });

function withSudo(command: Command, options: SystemPackageInstallerOptions): Command {
  return options.useSudo ? { command: 'sudo', args: [command.command, ...command.args] } : command;
}

/** Command refreshing the package index before the first install on a host, if the os has one. */
export function refreshIndexCommand(os: TargetOs, options: SystemPackageInstallerOptions = {}): Command | undefined {
  return os === 'linux' ? withSudo({ command: 'apt-get', args: ['update'] }, options) : undefined;
}

/** Commands that install one tool, in order. */
export function installCommands(tool: ToolRequest, os: TargetOs, options: SystemPackageInstallerOptions = {}): Command[] {
  if (tool.kind === 'toolchain') {
    const args = ['toolchain', 'install', options.channel ?? DEFAULT_CHANNEL, '--profile', 'minimal'];
    for (const component of tool.components) args.push('--component', component);
    if (tool.crossTarget) args.push('--target', tool.crossTarget);
    return [{ command: 'rustup', args }];
  }

  switch (os) {
    case 'linux':
      return [withSudo({ command: 'apt-get', args: ['install', '-y', '--no-install-recommends', tool.name] }, options)];
    case 'windows':
      return [{ command: 'choco', args: ['install', '-y', '--no-progress', tool.name] }];
    case 'macos':
      return [{ command: 'brew', args: ['install', tool.name] }];
  }
}

function toolKey(tool: ToolRequest, os: TargetOs): string {
  return tool.kind === 'toolchain'
    ? `toolchain:${tool.crossTarget ?? ''}:${[...tool.components].sort().join(',')}`
    : `package:${os}:${tool.name}`;
}

export class SystemPackageInstaller implements ToolchainInstaller {
  private installed = new Map<string, Promise<InstallResult>>();
  private refreshed = new Map<TargetOs, Promise<InstallResult>>();

  constructor(private runner: CommandRunner, private options: SystemPackageInstallerOptions = {}) {}

  ensureInstalled(tool: ToolRequest, environment: BuildEnvironment): Promise<InstallResult> {
    const key = toolKey(tool, environment.target.os);
    const existing = this.installed.get(key);
    if (existing) return existing;

    const pending = this.install(tool, environment).then((result) => {
      // Failed installs are retried by the next job that needs the tool.
      if (!result.ok) this.installed.delete(key);
      return result;
    });
    this.installed.set(key, pending);
    return pending;
  }

  /** Refresh the package index once per host os, ahead of its first package install. */
  private refreshIndex(environment: BuildEnvironment): Promise<InstallResult> {
    const os = environment.target.os;
    const existing = this.refreshed.get(os);
    if (existing) return existing;

    const command = refreshIndexCommand(os, this.options);
    const pending = (command ? this.runAll([command], environment) : Promise.resolve<InstallResult>({ ok: true })).then(
      (result) => {
        if (!result.ok) this.refreshed.delete(os);
        return result;
      },
    );
    this.refreshed.set(os, pending);
    return pending;
  }

  private async install(tool: ToolRequest, environment: BuildEnvironment): Promise<InstallResult> {
    if (tool.kind === 'package') {
      const refreshed = await this.refreshIndex(environment);
      if (!refreshed.ok) return refreshed;
    }
    return this.runAll(installCommands(tool, environment.target.os, this.options), environment);
  }

  private async runAll(commands: Command[], environment: BuildEnvironment): Promise<InstallResult> {
    for (const { command, args } of commands) {
      const line = formatCommand(command, args);
      log.info('Installing', { command: line, target: environment.target.id });
      try {
        const result = await this.runner.run({ command, args, cwd: environment.workDir });
        if (result.exitCode !== 0) {
          return { ok: false, message: `${line} exited with code ${result.exitCode}: ${result.output.trim()}` };
        }
      } catch (err) {
        return { ok: false, message: `${line} could not be started: ${describeError(err)}` };
      }
    }
    return { ok: true };
  }
}
