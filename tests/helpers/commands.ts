import { CommandRequest, CommandResult, CommandRunner } from '../../src/adapters/command-runner';

type Script = (request: CommandRequest) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

/** Records every request and answers from a script; exit code 0 by default. */
export class ScriptedCommandRunner implements CommandRunner {
  requests: CommandRequest[] = [];

  constructor(private script: Script = () => ({})) {}

  async run(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    const result = await this.script(request);
    return { exitCode: 0, output: '', timedOut: false, ...result };
  }

  /** Command lines run so far, as "command arg arg". */
  lines(): string[] {
    return this.requests.map((r) => [r.command, ...r.args].join(' '));
  }
}
