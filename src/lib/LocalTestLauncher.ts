/**
 * LocalTestLauncher - Runs a project's test command and builds the result
 * tree from the reporter's service messages
 */

import { ITestLauncher, TestExecution, TestLaunchListener } from "../interfaces/IHostEnvironment";
import { CommandSpec } from "../types";
import { LocalProcessHandle } from "./LocalProcess";
import { ProcessTerminator } from "./ProcessTerminator";
import { ServiceMessageParser } from "./ServiceMessageParser";

export const PATTERN_PLACEHOLDER = "{pattern}";

export class LocalTestLauncher implements ITestLauncher {
  private active = 0;

  constructor(
    private readonly basePath: string,
    private readonly command: CommandSpec,
    private readonly terminator: ProcessTerminator
  ) {}

  launch(
    pattern: string,
    options: { debug: boolean },
    listener: TestLaunchListener
  ): TestExecution {
    const parser = new ServiceMessageParser();
    const args = this.command.args.map((arg) => arg.split(PATTERN_PLACEHOLDER).join(pattern));

    if (options.debug) {
      listener.onText("Debug launch is not available on the local host; running normally\n", "system");
    }

    const handle = LocalProcessHandle.spawn(
      { command: this.command.command, args, cwd: this.basePath },
      {
        onText: (text, stream) => {
          if (stream === "stdout") {
            parser.feed(text);
          }
          listener.onText(text, stream);
        },
        onTerminated: (exitCode) => {
          this.active--;
          parser.finish();
          listener.onTerminated(exitCode);
        },
      },
      this.terminator
    );
    this.active++;

    const execution: TestExecution = { handle, root: () => parser.root() };
    listener.onStarted?.(execution);
    return execution;
  }

  isTestActive(): boolean {
    return this.active > 0;
  }
}
